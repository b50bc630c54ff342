import { subHours } from 'date-fns';

// Domain
import { type HistoryRecord } from '../../../domain/entities/history-record.entity.js';
import { TitleFingerprint } from '../../../domain/value-objects/flash/title-fingerprint.vo.js';

// Ports
import { type DeduplicationConfigurationPort } from '../../ports/inbound/configuration.port.js';
import { type FlashHistoryRepositoryPort } from '../../ports/outbound/persistence/flash-history-repository.port.js';

export type HistoryLookup = { link: string } | { title: string };

/**
 * Tells whether a link, or an exact title, was accepted within the deduplication window
 */
export class LookupHistoryUseCase {
    constructor(
        private readonly flashHistoryRepository: FlashHistoryRepositoryPort,
        private readonly settings: DeduplicationConfigurationPort,
    ) {}

    public async execute(lookup: HistoryLookup): Promise<HistoryRecord | null> {
        const since = subHours(new Date(), this.settings.historyHours);

        if ('link' in lookup) {
            return this.flashHistoryRepository.findByLink(lookup.link, since);
        }

        return this.flashHistoryRepository.findByTitleFingerprint(
            TitleFingerprint.fromTitle(lookup.title),
            since,
        );
    }
}
