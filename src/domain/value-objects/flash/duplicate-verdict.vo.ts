import { z } from 'zod/v4';

export const duplicateKindSchema = z.enum(['LINK', 'TITLE', 'UNIQUE']);

export type DuplicateKind = z.infer<typeof duplicateKindSchema>;

const LINK_PREVIEW_LENGTH = 50;
const TITLE_PREVIEW_LENGTH = 40;

const preview = (text: string, length: number): string =>
    Array.from(text).slice(0, length).join('');

/**
 * @description
 * Outcome of matching one flash against the history window.
 * A duplicate always carries a human-readable reason.
 */
export class DuplicateVerdict {
    public readonly kind: DuplicateKind;
    public readonly reason: null | string;
    public readonly similarity: null | number;

    private constructor(kind: DuplicateKind, reason: null | string, similarity: null | number) {
        this.kind = duplicateKindSchema.parse(kind);
        this.reason = reason;
        this.similarity = similarity;
    }

    public static linkMatch(link: string): DuplicateVerdict {
        return new DuplicateVerdict(
            'LINK',
            `Link duplicate: ${preview(link, LINK_PREVIEW_LENGTH)}...`,
            null,
        );
    }

    public static titleMatch(similarity: number, existingTitle: string): DuplicateVerdict {
        const percent = Math.round(similarity * 100);
        return new DuplicateVerdict(
            'TITLE',
            `Title similar (${percent}%): ${preview(existingTitle, TITLE_PREVIEW_LENGTH)}...`,
            similarity,
        );
    }

    public static unique(): DuplicateVerdict {
        return new DuplicateVerdict('UNIQUE', null, null);
    }

    public isDuplicate(): boolean {
        return this.kind !== 'UNIQUE';
    }
}
