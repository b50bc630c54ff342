import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Configuration
import { type HistoryRetentionTaskConfig } from '../../../../application/ports/inbound/configuration.port.js';

// Application
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';
import { type PruneHistoryUseCase } from '../../../../application/use-cases/history/prune-history.use-case.js';

/**
 * Deletes history older than the retention period, once at startup and then on schedule
 */
export class HistoryRetentionTask implements TaskPort {
    public readonly executeOnStartup = true;
    public readonly name = 'history-retention';
    public readonly schedule: string;

    constructor(
        private readonly pruneHistory: PruneHistoryUseCase,
        private readonly config: HistoryRetentionTaskConfig,
        private readonly logger: LoggerPort,
    ) {
        this.schedule = config.schedule;
    }

    async execute(): Promise<void> {
        this.logger.info('History retention task started', {
            retentionDays: this.config.retentionDays,
        });

        const deletedCount = await this.pruneHistory.execute(this.config.retentionDays);

        this.logger.info('History retention task completed', { deletedCount });
    }
}
