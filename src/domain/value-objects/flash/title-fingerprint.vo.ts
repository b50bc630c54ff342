import { createHash } from 'node:crypto';
import { z } from 'zod/v4';

export const titleFingerprintSchema = z.string().regex(/^[0-9a-f]{32}$/);

/**
 * Lower-cases and trims a title. Punctuation and inner whitespace are kept as-is.
 */
export const normalizeTitle = (title: string): string => title.toLowerCase().trim();

/**
 * @description
 * MD5 hex digest of the normalized title, used as an exact-title fast path.
 */
export class TitleFingerprint {
    public readonly value: string;

    constructor(value: string) {
        const result = titleFingerprintSchema.safeParse(value);

        if (!result.success) {
            throw new Error(`Invalid title fingerprint: ${result.error.message}`);
        }

        this.value = result.data;
    }

    public static fromTitle(title: string): TitleFingerprint {
        return new TitleFingerprint(
            createHash('md5').update(normalizeTitle(title), 'utf8').digest('hex'),
        );
    }

    public equals(other: TitleFingerprint): boolean {
        return this.value === other.value;
    }

    public toString(): string {
        return this.value;
    }
}
