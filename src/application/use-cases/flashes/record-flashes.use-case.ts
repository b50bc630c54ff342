import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { type Flash } from '../../../domain/entities/flash.entity.js';
import { type HistoryRecord } from '../../../domain/entities/history-record.entity.js';

// Ports
import { type FlashHistoryRepositoryPort } from '../../ports/outbound/persistence/flash-history-repository.port.js';

/**
 * Use case for committing accepted flashes to the history store
 */
export class RecordFlashesUseCase {
    constructor(
        private readonly flashHistoryRepository: FlashHistoryRepositoryPort,
        private readonly logger: LoggerPort,
    ) {}

    /**
     * @param flashes - Flashes accepted as new, possibly polished since
     * @returns The inserted records in input order
     */
    public async execute(flashes: Flash[]): Promise<HistoryRecord[]> {
        if (flashes.length === 0) {
            return [];
        }

        try {
            const records = await this.flashHistoryRepository.insertBatch(flashes);

            this.logger.info('Flashes recorded in history', { count: records.length });

            return records;
        } catch (error) {
            this.logger.error('Failed to record flashes in history', {
                count: flashes.length,
                error,
            });
            throw error;
        }
    }
}
