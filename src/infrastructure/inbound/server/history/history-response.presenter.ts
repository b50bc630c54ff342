// Application
import { type HistoryStatsReport } from '../../../../application/use-cases/history/get-history-stats.use-case.js';

// Domain
import { type HistoryRecord } from '../../../../domain/entities/history-record.entity.js';

export type HistoryRecordResponse = {
    createdAt: string;
    flash: Record<string, unknown>;
    id: number;
    titleFingerprint: string;
};

export type HistoryListResponse = {
    items: HistoryRecordResponse[];
    total: number;
};

export type HistoryLookupResponse = {
    found: boolean;
    record: HistoryRecordResponse | null;
};

/**
 * Formats history records for HTTP. The flash is returned as the payload it was posted with.
 */
export class HistoryResponsePresenter {
    presentList(records: HistoryRecord[]): HistoryListResponse {
        return {
            items: records.map((record) => this.presentRecord(record)),
            total: records.length,
        };
    }

    presentLookup(record: HistoryRecord | null): HistoryLookupResponse {
        return {
            found: record !== null,
            record: record ? this.presentRecord(record) : null,
        };
    }

    presentRecord(record: HistoryRecord): HistoryRecordResponse {
        return {
            createdAt: record.createdAt.toISOString(),
            flash: record.flash.payload,
            id: record.id,
            titleFingerprint: record.titleFingerprint.toString(),
        };
    }

    presentStats(report: HistoryStatsReport): HistoryStatsReport {
        return { ...report };
    }
}
