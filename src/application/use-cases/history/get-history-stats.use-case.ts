import { subHours } from 'date-fns';

// Ports
import { type DeduplicationConfigurationPort } from '../../ports/inbound/configuration.port.js';
import {
    type FlashHistoryRepositoryPort,
    type FlashHistoryStats,
} from '../../ports/outbound/persistence/flash-history-repository.port.js';

export interface HistoryStatsReport extends FlashHistoryStats {
    historyHours: number;
    similarityThreshold: number;
}

export class GetHistoryStatsUseCase {
    constructor(
        private readonly flashHistoryRepository: FlashHistoryRepositoryPort,
        private readonly settings: DeduplicationConfigurationPort,
    ) {}

    public async execute(): Promise<HistoryStatsReport> {
        const { historyHours, similarityThreshold } = this.settings;
        const stats = await this.flashHistoryRepository.getStats(
            subHours(new Date(), historyHours),
        );

        return { ...stats, historyHours, similarityThreshold };
    }
}
