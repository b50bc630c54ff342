import { subDays } from 'date-fns';

// Domain
import { type HistoryRecord } from '../../../domain/entities/history-record.entity.js';

// Ports
import { type FlashHistoryRepositoryPort } from '../../ports/outbound/persistence/flash-history-repository.port.js';

/**
 * Lists high-scoring flashes accepted over the last few days
 */
export class GetTopScoredHistoryUseCase {
    constructor(private readonly flashHistoryRepository: FlashHistoryRepositoryPort) {}

    public async execute(params: { days: number; minScore: number }): Promise<HistoryRecord[]> {
        return this.flashHistoryRepository.findTopScored({
            minScore: params.minScore,
            since: subDays(new Date(), params.days),
        });
    }
}
