import { type Flash } from '../../../../domain/entities/flash.entity.js';
import { type HistoryRecord } from '../../../../domain/entities/history-record.entity.js';
import { type TitleFingerprint } from '../../../../domain/value-objects/flash/title-fingerprint.vo.js';

/**
 * Aggregate figures over the stored history
 */
export interface FlashHistoryStats {
    /**
     * Mean of positive total scores, one decimal, 0 when there are none
     */
    averageScore: number;
    polishedCount: number;
    recordsInWindow: number;
    totalRecords: number;
}

/**
 * A legacy history entry carrying its own insertion time
 */
export interface ArchivedFlash {
    createdAt: Date;
    flash: Flash;
}

/**
 * Repository port for the accepted-flash history.
 * Every operation rejects with `StorageFailureError` when the store cannot be read or written.
 */
export interface FlashHistoryRepositoryPort {
    /**
     * Delete records created strictly before the cutoff
     * @returns the number of deleted records
     */
    deleteOlderThan(cutoff: Date): Promise<number>;

    /**
     * Find the most recent record with this exact link created after `since`
     */
    findByLink(link: string, since: Date): Promise<HistoryRecord | null>;

    /**
     * Find the most recent record with this title fingerprint created after `since`
     */
    findByTitleFingerprint(
        fingerprint: TitleFingerprint,
        since: Date,
    ): Promise<HistoryRecord | null>;

    /**
     * Records created in [from, to), best scores first
     */
    findCreatedBetween(criteria: { from: Date; limit: number; to: Date }): Promise<HistoryRecord[]>;

    /**
     * Records scoring at least `minScore` created after `since`, best scores first
     */
    findTopScored(criteria: { minScore: number; since: Date }): Promise<HistoryRecord[]>;

    /**
     * Records created strictly after `since`, newest first, ties broken by newest id
     */
    findWithinWindow(since: Date): Promise<HistoryRecord[]>;

    getStats(windowSince: Date): Promise<FlashHistoryStats>;

    /**
     * Insert legacy entries with their original creation time
     */
    importArchived(entries: ArchivedFlash[]): Promise<number>;

    /**
     * Append one record per flash, all sharing the same creation time
     */
    insertBatch(flashes: Flash[]): Promise<HistoryRecord[]>;

    /**
     * Substring match on title or body, newest first
     */
    search(criteria: { keyword: string; limit: number }): Promise<HistoryRecord[]>;
}
