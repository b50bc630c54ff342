import type Database from 'better-sqlite3';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Application
import {
    type ArchivedFlash,
    type FlashHistoryRepositoryPort,
    type FlashHistoryStats,
} from '../../../../application/ports/outbound/persistence/flash-history-repository.port.js';
import { MalformedRecordError } from '../../../../application/ports/outbound/persistence/malformed-record.error.js';
import { StorageFailureError } from '../../../../application/ports/outbound/persistence/storage-failure.error.js';

// Domain
import { type Flash } from '../../../../domain/entities/flash.entity.js';
import { HistoryRecord } from '../../../../domain/entities/history-record.entity.js';
import { type TitleFingerprint } from '../../../../domain/value-objects/flash/title-fingerprint.vo.js';

import { type SqliteDatabase } from '../sqlite.database.js';

import {
    FlashHistoryMapper,
    type FlashHistoryInsertParams,
    type FlashHistoryRow,
} from './sqlite-flash-history.mapper.js';

const INSERT_SQL = `
INSERT INTO flash_history (
    title, title_fingerprint, body, link, source, publish_time,
    score_importance, score_authority, score_trending, score_timeliness, score_total,
    gpt_title, gpt_body, polished, raw_json, created_at, updated_at
) VALUES (
    @title, @title_fingerprint, @body, @link, @source, @publish_time,
    @score_importance, @score_authority, @score_trending, @score_timeliness, @score_total,
    @gpt_title, @gpt_body, @polished, @raw_json, @created_at, @updated_at
)`;

const NEWEST_FIRST = 'ORDER BY created_at DESC, id DESC';
const BEST_SCORE_FIRST = 'ORDER BY score_total DESC, created_at DESC, id DESC';

interface StatsRow {
    averageScore: null | number;
    polishedCount: null | number;
    recordsInWindow: null | number;
    totalRecords: number;
}

/**
 * Wraps `%`, `_` and the escape character so a keyword matches as a literal substring
 */
const toLikePattern = (keyword: string): string =>
    `%${keyword.replace(/[\\%_]/g, (character) => `\\${character}`)}%`;

export class SqliteFlashHistoryRepository implements FlashHistoryRepositoryPort {
    private lastCreatedAt = 0;
    private readonly mapper: FlashHistoryMapper;

    constructor(
        private readonly database: SqliteDatabase,
        private readonly logger: LoggerPort,
    ) {
        this.mapper = new FlashHistoryMapper();
    }

    async deleteOlderThan(cutoff: Date): Promise<number> {
        return this.run('deleteOlderThan', (connection) => {
            const result = connection
                .prepare<[string]>('DELETE FROM flash_history WHERE created_at < ?')
                .run(cutoff.toISOString());
            return result.changes;
        });
    }

    async findByLink(link: string, since: Date): Promise<HistoryRecord | null> {
        return this.run('findByLink', (connection) => {
            const row = connection
                .prepare<[string, string], FlashHistoryRow>(
                    `SELECT * FROM flash_history WHERE link = ? AND created_at > ? ${NEWEST_FIRST} LIMIT 1`,
                )
                .get(link, since.toISOString());
            return row ? this.toRecordWithFallback(row) : null;
        });
    }

    async findByTitleFingerprint(
        fingerprint: TitleFingerprint,
        since: Date,
    ): Promise<HistoryRecord | null> {
        return this.run('findByTitleFingerprint', (connection) => {
            const row = connection
                .prepare<[string, string], FlashHistoryRow>(
                    `SELECT * FROM flash_history WHERE title_fingerprint = ? AND created_at > ? ${NEWEST_FIRST} LIMIT 1`,
                )
                .get(fingerprint.value, since.toISOString());
            return row ? this.toRecordWithFallback(row) : null;
        });
    }

    async findCreatedBetween(criteria: {
        from: Date;
        limit: number;
        to: Date;
    }): Promise<HistoryRecord[]> {
        return this.run('findCreatedBetween', (connection) => {
            const rows = connection
                .prepare<{ from: string; limit: number; to: string }, FlashHistoryRow>(
                    `SELECT * FROM flash_history WHERE created_at >= @from AND created_at < @to ${BEST_SCORE_FIRST} LIMIT @limit`,
                )
                .all({
                    from: criteria.from.toISOString(),
                    limit: criteria.limit,
                    to: criteria.to.toISOString(),
                });
            return this.toRecordsSkippingMalformed(rows);
        });
    }

    async findTopScored(criteria: { minScore: number; since: Date }): Promise<HistoryRecord[]> {
        return this.run('findTopScored', (connection) => {
            const rows = connection
                .prepare<{ minScore: number; since: string }, FlashHistoryRow>(
                    `SELECT * FROM flash_history WHERE score_total >= @minScore AND created_at > @since ${BEST_SCORE_FIRST}`,
                )
                .all({ minScore: criteria.minScore, since: criteria.since.toISOString() });
            return this.toRecordsSkippingMalformed(rows);
        });
    }

    async findWithinWindow(since: Date): Promise<HistoryRecord[]> {
        return this.run('findWithinWindow', (connection) => {
            const rows = connection
                .prepare<[string], FlashHistoryRow>(
                    `SELECT * FROM flash_history WHERE created_at > ? ${NEWEST_FIRST}`,
                )
                .all(since.toISOString());
            return rows.map((row) => this.toRecordWithFallback(row));
        });
    }

    async getStats(windowSince: Date): Promise<FlashHistoryStats> {
        return this.run('getStats', (connection) => {
            const row = connection
                .prepare<{ since: string }, StatsRow>(
                    `SELECT
                        COUNT(*) AS totalRecords,
                        SUM(CASE WHEN created_at > @since THEN 1 ELSE 0 END) AS recordsInWindow,
                        SUM(CASE WHEN polished = 1 THEN 1 ELSE 0 END) AS polishedCount,
                        AVG(CASE WHEN score_total > 0 THEN score_total END) AS averageScore
                    FROM flash_history`,
                )
                .get({ since: windowSince.toISOString() });

            const averageScore = row?.averageScore ?? null;

            return {
                averageScore: averageScore === null ? 0 : Math.round(averageScore * 10) / 10,
                polishedCount: row?.polishedCount ?? 0,
                recordsInWindow: row?.recordsInWindow ?? 0,
                totalRecords: row?.totalRecords ?? 0,
            };
        });
    }

    async importArchived(entries: ArchivedFlash[]): Promise<number> {
        if (entries.length === 0) return 0;

        return this.run('importArchived', (connection) => {
            const insert = connection.prepare<FlashHistoryInsertParams>(INSERT_SQL);
            const importAll = connection.transaction((params: FlashHistoryInsertParams[]) => {
                for (const entry of params) {
                    insert.run(entry);
                }
                return params.length;
            });

            return importAll(
                entries.map((entry) => this.mapper.toInsertParams(entry.flash, entry.createdAt)),
            );
        });
    }

    async insertBatch(flashes: Flash[]): Promise<HistoryRecord[]> {
        if (flashes.length === 0) return [];

        return this.run('insertBatch', (connection) => {
            const createdAt = this.nextCreatedAt();
            const insert = connection.prepare<FlashHistoryInsertParams>(INSERT_SQL);
            const insertAll = connection.transaction((batch: Flash[]) =>
                batch.map((flash) => {
                    const result = insert.run(this.mapper.toInsertParams(flash, createdAt));
                    return new HistoryRecord({
                        createdAt,
                        flash,
                        id: Number(result.lastInsertRowid),
                        titleFingerprint: flash.titleFingerprint,
                        updatedAt: createdAt,
                    });
                }),
            );

            return insertAll(flashes);
        });
    }

    async search(criteria: { keyword: string; limit: number }): Promise<HistoryRecord[]> {
        return this.run('search', (connection) => {
            const rows = connection
                .prepare<{ limit: number; pattern: string }, FlashHistoryRow>(
                    `SELECT * FROM flash_history
                    WHERE title LIKE @pattern ESCAPE '\\' OR body LIKE @pattern ESCAPE '\\'
                    ${NEWEST_FIRST} LIMIT @limit`,
                )
                .all({ limit: criteria.limit, pattern: toLikePattern(criteria.keyword) });
            return this.toRecordsSkippingMalformed(rows);
        });
    }

    /**
     * Creation times never go backwards within this process, even if the clock does
     */
    private nextCreatedAt(): Date {
        this.lastCreatedAt = Math.max(Date.now(), this.lastCreatedAt);
        return new Date(this.lastCreatedAt);
    }

    private async run<T>(
        operation: string,
        work: (connection: Database.Database) => T,
    ): Promise<T> {
        try {
            return work(this.database.getConnection());
        } catch (error) {
            if (error instanceof StorageFailureError) throw error;
            throw new StorageFailureError(operation, error);
        }
    }

    private toRecordsSkippingMalformed(rows: FlashHistoryRow[]): HistoryRecord[] {
        const records: HistoryRecord[] = [];
        for (const row of rows) {
            try {
                records.push(this.mapper.toDomain(row));
            } catch (error) {
                if (!(error instanceof MalformedRecordError)) throw error;
                this.logger.warn('Skipping malformed history record', {
                    error,
                    recordId: row.id,
                });
            }
        }
        return records;
    }

    private toRecordWithFallback(row: FlashHistoryRow): HistoryRecord {
        try {
            return this.mapper.toDomain(row);
        } catch (error) {
            if (!(error instanceof MalformedRecordError)) throw error;
            this.logger.warn('History record payload rebuilt from columns', {
                error,
                recordId: row.id,
            });
            return this.mapper.toDomainFromColumns(row);
        }
    }
}
