// Application
import { MalformedRecordError } from '../../../../application/ports/outbound/persistence/malformed-record.error.js';

// Domain
import { Flash } from '../../../../domain/entities/flash.entity.js';
import { HistoryRecord } from '../../../../domain/entities/history-record.entity.js';
import { FlashScore } from '../../../../domain/value-objects/flash/flash-score.vo.js';
import { TitleFingerprint } from '../../../../domain/value-objects/flash/title-fingerprint.vo.js';

/**
 * A `flash_history` row as returned by `SELECT *`
 */
export interface FlashHistoryRow {
    body: null | string;
    created_at: string;
    gpt_body: null | string;
    gpt_title: null | string;
    id: number;
    link: null | string;
    polished: null | number;
    publish_time: null | string;
    raw_json: null | string;
    score_authority: null | number;
    score_importance: null | number;
    score_timeliness: null | number;
    score_total: null | number;
    score_trending: null | number;
    source: null | string;
    title: string;
    title_fingerprint: string;
    updated_at: string;
}

/**
 * Named parameters of the insert statement
 */
export type FlashHistoryInsertParams = Omit<FlashHistoryRow, 'id'>;

export class FlashHistoryMapper {
    /**
     * Maps a row, decoding `raw_json` as the payload
     * @throws MalformedRecordError when `raw_json` is not a JSON object
     */
    toDomain(row: FlashHistoryRow): HistoryRecord {
        return this.buildRecord(row, this.decodePayload(row));
    }

    /**
     * Maps a row with a payload rebuilt from the typed columns, ignoring `raw_json`
     */
    toDomainFromColumns(row: FlashHistoryRow): HistoryRecord {
        return this.buildRecord(row, this.payloadFromColumns(row));
    }

    toInsertParams(flash: Flash, createdAt: Date): FlashHistoryInsertParams {
        const timestamp = createdAt.toISOString();
        return {
            body: flash.body,
            created_at: timestamp,
            gpt_body: flash.gptBody,
            gpt_title: flash.gptTitle,
            link: flash.link,
            polished: flash.polished ? 1 : 0,
            publish_time: flash.publishTime,
            raw_json: JSON.stringify(flash.payload),
            score_authority: flash.score.authority,
            score_importance: flash.score.importance,
            score_timeliness: flash.score.timeliness,
            score_total: flash.score.total,
            score_trending: flash.score.trending,
            source: flash.source,
            title: flash.title,
            title_fingerprint: flash.titleFingerprint.value,
            updated_at: timestamp,
        };
    }

    private buildRecord(row: FlashHistoryRow, payload: Record<string, unknown>): HistoryRecord {
        const flash = new Flash({
            body: row.body ?? '',
            gptBody: row.gpt_body ?? '',
            gptTitle: row.gpt_title ?? '',
            link: row.link ?? '',
            payload,
            polished: row.polished === 1,
            publishTime: row.publish_time ?? '',
            score: new FlashScore({
                authority: row.score_authority ?? 0,
                importance: row.score_importance ?? 0,
                timeliness: row.score_timeliness ?? 0,
                total: row.score_total ?? 0,
                trending: row.score_trending ?? 0,
            }),
            source: row.source ?? '',
            title: row.title,
        });

        return new HistoryRecord({
            createdAt: new Date(row.created_at),
            flash,
            id: row.id,
            titleFingerprint: new TitleFingerprint(row.title_fingerprint),
            updatedAt: new Date(row.updated_at),
        });
    }

    private decodePayload(row: FlashHistoryRow): Record<string, unknown> {
        if (row.raw_json === null) {
            throw new MalformedRecordError(row.id, 'raw_json is empty');
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(row.raw_json);
        } catch (error) {
            throw new MalformedRecordError(
                row.id,
                error instanceof Error ? error.message : String(error),
            );
        }

        if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
            throw new MalformedRecordError(row.id, 'raw_json is not an object');
        }

        return { ...decoded };
    }

    private payloadFromColumns(row: FlashHistoryRow): Record<string, unknown> {
        return {
            body: row.body ?? '',
            gpt_body: row.gpt_body ?? '',
            gpt_title: row.gpt_title ?? '',
            link: row.link ?? '',
            polished: row.polished === 1,
            publish_time: row.publish_time ?? '',
            score: {
                authority: row.score_authority ?? 0,
                importance: row.score_importance ?? 0,
                timeliness: row.score_timeliness ?? 0,
                total: row.score_total ?? 0,
                trending: row.score_trending ?? 0,
            },
            source: row.source ?? '',
            title: row.title,
        };
    }
}
