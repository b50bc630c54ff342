import { subHours } from 'date-fns';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { type Flash } from '../../../domain/entities/flash.entity.js';
import {
    type DuplicateReference,
    type FlashDuplicateMatcher,
} from '../../../domain/services/flash-duplicate-matcher.service.js';
import { type DuplicateVerdict } from '../../../domain/value-objects/flash/duplicate-verdict.vo.js';

// Ports
import { type DeduplicationConfigurationPort } from '../../ports/inbound/configuration.port.js';
import { type FlashHistoryRepositoryPort } from '../../ports/outbound/persistence/flash-history-repository.port.js';

export interface DuplicateFlash {
    flash: Flash;
    reason: string;
    verdict: DuplicateVerdict;
}

export interface FilterDuplicateFlashesResult {
    duplicates: DuplicateFlash[];
    newFlashes: Flash[];
}

/**
 * Use case for splitting a batch of flashes into new ones and duplicates of recent history
 * @description Reads the history window once, then checks each flash in input order.
 * Nothing is written: committing the new flashes is the caller's next step.
 */
export class FilterDuplicateFlashesUseCase {
    constructor(
        private readonly flashHistoryRepository: FlashHistoryRepositoryPort,
        private readonly duplicateMatcher: FlashDuplicateMatcher,
        private readonly settings: DeduplicationConfigurationPort,
        private readonly logger: LoggerPort,
    ) {}

    /**
     * @param flashes - Scored flashes in the order they were produced
     * @returns New flashes in input order, and duplicates paired with the reason
     */
    public async execute(flashes: Flash[]): Promise<FilterDuplicateFlashesResult> {
        if (flashes.length === 0) {
            this.logger.info('No flashes to deduplicate');
            return { duplicates: [], newFlashes: [] };
        }

        const { foldBatchCandidates, historyHours, similarityThreshold } = this.settings;
        const since = subHours(new Date(), historyHours);
        const window = await this.flashHistoryRepository.findWithinWindow(since);

        this.logger.info('History window loaded for deduplication', {
            candidateCount: flashes.length,
            historyHours,
            windowCount: window.length,
        });

        const references: DuplicateReference[] = [...window];
        const newFlashes: Flash[] = [];
        const duplicates: DuplicateFlash[] = [];

        for (const flash of flashes) {
            const verdict = this.duplicateMatcher.match(flash, references, similarityThreshold);
            const { reason } = verdict;

            if (reason === null) {
                newFlashes.push(flash);
                if (foldBatchCandidates) {
                    references.push(flash);
                }
                continue;
            }

            duplicates.push({ flash, reason, verdict });
            this.logger.debug('Flash identified as duplicate', { reason, title: flash.title });
        }

        this.logger.info('Flash deduplication completed', {
            duplicateCount: duplicates.length,
            newCount: newFlashes.length,
        });

        return { duplicates, newFlashes };
    }
}
