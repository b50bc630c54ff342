/**
 * SQLite schema of the flash history. Applied on every connect; each statement is idempotent.
 */
export const FLASH_HISTORY_SCHEMA = `
CREATE TABLE IF NOT EXISTS flash_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    title_fingerprint TEXT NOT NULL,
    body TEXT,
    link TEXT,
    source TEXT,
    publish_time TEXT,
    score_importance INTEGER DEFAULT 0,
    score_authority INTEGER DEFAULT 0,
    score_trending INTEGER DEFAULT 0,
    score_timeliness INTEGER DEFAULT 0,
    score_total INTEGER DEFAULT 0,
    gpt_title TEXT,
    gpt_body TEXT,
    polished INTEGER DEFAULT 0,
    raw_json TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_flash_history_link ON flash_history(link);
CREATE INDEX IF NOT EXISTS idx_flash_history_title_fingerprint ON flash_history(title_fingerprint);
CREATE INDEX IF NOT EXISTS idx_flash_history_created_at ON flash_history(created_at);
CREATE INDEX IF NOT EXISTS idx_flash_history_score_total ON flash_history(score_total);
`;
