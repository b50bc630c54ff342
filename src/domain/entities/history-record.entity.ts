import { z } from 'zod/v4';

import { TitleFingerprint } from '../value-objects/flash/title-fingerprint.vo.js';

import { Flash } from './flash.entity.js';

export const historyRecordSchema = z.object({
    createdAt: z.date().describe('Insertion time assigned by the store. Window queries key on it.'),
    flash: z.instanceof(Flash).describe('The accepted flash.'),
    id: z.number().int().positive().describe('Monotonic identifier assigned on insert.'),
    titleFingerprint: z
        .instanceof(TitleFingerprint)
        .describe('Fingerprint of the normalized title, derived on insert.'),
    updatedAt: z.date().describe('Equal to createdAt. Records are never updated.'),
});

export type HistoryRecordProps = z.input<typeof historyRecordSchema>;

/**
 * @description A flash accepted as new and committed to the history store. Immutable.
 */
export class HistoryRecord {
    public readonly createdAt: Date;
    public readonly flash: Flash;
    public readonly id: number;
    public readonly titleFingerprint: TitleFingerprint;
    public readonly updatedAt: Date;

    public constructor(data: HistoryRecordProps) {
        const result = historyRecordSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid history record data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.id = validatedData.id;
        this.flash = validatedData.flash;
        this.titleFingerprint = validatedData.titleFingerprint;
        this.createdAt = validatedData.createdAt;
        this.updatedAt = validatedData.updatedAt;
    }

    public get link(): string {
        return this.flash.link;
    }

    public get title(): string {
        return this.flash.title;
    }
}
