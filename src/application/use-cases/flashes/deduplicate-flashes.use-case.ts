import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { type Flash } from '../../../domain/entities/flash.entity.js';

import {
    type FilterDuplicateFlashesResult,
    type FilterDuplicateFlashesUseCase,
} from './filter-duplicate-flashes.use-case.js';
import { type RecordFlashesUseCase } from './record-flashes.use-case.js';

export interface DeduplicateFlashesResult extends FilterDuplicateFlashesResult {
    recordedCount: number;
}

/**
 * Use case for filtering a batch and, optionally, committing its new flashes in one call
 * @description Calls run one at a time, so a batch is filtered against every batch committed
 * before it.
 */
export class DeduplicateFlashesUseCase {
    private pending: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly filterDuplicateFlashes: FilterDuplicateFlashesUseCase,
        private readonly recordFlashes: RecordFlashesUseCase,
        private readonly logger: LoggerPort,
    ) {}

    public async execute(
        flashes: Flash[],
        options: { commit: boolean },
    ): Promise<DeduplicateFlashesResult> {
        const run = this.pending.then(() => this.filterAndCommit(flashes, options));
        // A failed run rejects for its own caller only
        this.pending = run.catch(() => undefined);

        return run;
    }

    private async filterAndCommit(
        flashes: Flash[],
        options: { commit: boolean },
    ): Promise<DeduplicateFlashesResult> {
        const result = await this.filterDuplicateFlashes.execute(flashes);

        if (!options.commit || result.newFlashes.length === 0) {
            return { ...result, recordedCount: 0 };
        }

        const records = await this.recordFlashes.execute(result.newFlashes);

        this.logger.info('Deduplicated batch committed', {
            duplicateCount: result.duplicates.length,
            recordedCount: records.length,
        });

        return { ...result, recordedCount: records.length };
    }
}
