// Application
import { type DeduplicateFlashesResult } from '../../../../application/use-cases/flashes/deduplicate-flashes.use-case.js';

// Domain
import { type HistoryRecord } from '../../../../domain/entities/history-record.entity.js';
import { type DuplicateKind } from '../../../../domain/value-objects/flash/duplicate-verdict.vo.js';

import {
    type HistoryRecordResponse,
    HistoryResponsePresenter,
} from '../history/history-response.presenter.js';

type DuplicateFlashResponse = {
    flash: Record<string, unknown>;
    kind: DuplicateKind;
    reason: string;
    similarity: null | number;
};

type DeduplicateFlashesResponse = {
    duplicates: DuplicateFlashResponse[];
    newFlashes: Record<string, unknown>[];
    recordedCount: number;
};

type RecordFlashesResponse = {
    recordedCount: number;
    records: HistoryRecordResponse[];
};

/**
 * Formats flash batches for HTTP. Flashes go back out as the payloads they came in as.
 */
export class FlashesResponsePresenter {
    private readonly historyPresenter = new HistoryResponsePresenter();

    presentDeduplication(result: DeduplicateFlashesResult): DeduplicateFlashesResponse {
        return {
            duplicates: result.duplicates.map(({ flash, reason, verdict }) => ({
                flash: flash.payload,
                kind: verdict.kind,
                reason,
                similarity: verdict.similarity,
            })),
            newFlashes: result.newFlashes.map((flash) => flash.payload),
            recordedCount: result.recordedCount,
        };
    }

    presentRecorded(records: HistoryRecord[]): RecordFlashesResponse {
        return {
            recordedCount: records.length,
            records: records.map((record) => this.historyPresenter.presentRecord(record)),
        };
    }
}
