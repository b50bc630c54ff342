import { sequenceSimilarity } from '../../shared/text/sequence-similarity.js';

import { DuplicateVerdict } from '../value-objects/flash/duplicate-verdict.vo.js';
import {
    normalizeTitle,
    type TitleFingerprint,
} from '../value-objects/flash/title-fingerprint.vo.js';

/**
 * Anything a flash can be compared against: a history record, or a flash accepted earlier in
 * the same batch.
 */
export interface DuplicateReference {
    readonly link: string;
    readonly title: string;
    readonly titleFingerprint: TitleFingerprint;
}

/**
 * Decides whether a flash duplicates one of the given references.
 * A link match anywhere in the references wins over any title similarity.
 */
export class FlashDuplicateMatcher {
    public match(
        candidate: DuplicateReference,
        references: readonly DuplicateReference[],
        similarityThreshold: number,
    ): DuplicateVerdict {
        if (candidate.link) {
            const sameLink = references.find((reference) => reference.link === candidate.link);
            if (sameLink) {
                return DuplicateVerdict.linkMatch(candidate.link);
            }
        }

        const candidateTitle = normalizeTitle(candidate.title);
        const candidateFingerprint = candidate.titleFingerprint;

        for (const reference of references) {
            const similarity = reference.titleFingerprint.equals(candidateFingerprint)
                ? 1
                : sequenceSimilarity(candidateTitle, normalizeTitle(reference.title));

            if (similarity >= similarityThreshold) {
                return DuplicateVerdict.titleMatch(similarity, reference.title);
            }
        }

        return DuplicateVerdict.unique();
    }
}
