// Domain
import { type HistoryRecord } from '../../../domain/entities/history-record.entity.js';

// Ports
import { type FlashHistoryRepositoryPort } from '../../ports/outbound/persistence/flash-history-repository.port.js';

export class SearchHistoryUseCase {
    constructor(private readonly flashHistoryRepository: FlashHistoryRepositoryPort) {}

    public async execute(params: { keyword: string; limit: number }): Promise<HistoryRecord[]> {
        return this.flashHistoryRepository.search(params);
    }
}
