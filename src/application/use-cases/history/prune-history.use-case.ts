import { subDays } from 'date-fns';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type FlashHistoryRepositoryPort } from '../../ports/outbound/persistence/flash-history-repository.port.js';

const DEFAULT_RETENTION_DAYS = 7;

/**
 * Use case for deleting history older than the retention period
 * @description Day-level storage hygiene, independent of the hour-level deduplication window
 */
export class PruneHistoryUseCase {
    constructor(
        private readonly flashHistoryRepository: FlashHistoryRepositoryPort,
        private readonly logger: LoggerPort,
    ) {}

    /**
     * @returns The number of deleted records
     */
    public async execute(retentionDays: number = DEFAULT_RETENTION_DAYS): Promise<number> {
        const cutoff = subDays(new Date(), retentionDays);

        const deletedCount = await this.flashHistoryRepository.deleteOlderThan(cutoff);

        this.logger.info('History pruned', {
            cutoff: cutoff.toISOString(),
            deletedCount,
            retentionDays,
        });

        return deletedCount;
    }
}
