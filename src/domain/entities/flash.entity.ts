import { z } from 'zod/v4';

import { FlashScore } from '../value-objects/flash/flash-score.vo.js';
import { TitleFingerprint } from '../value-objects/flash/title-fingerprint.vo.js';

const optionalText = z
    .string()
    .nullish()
    .transform((value) => value ?? '');

/**
 * Wire shape of a flash as emitted by the generation stage.
 * Unknown keys are accepted and kept in the verbatim payload.
 */
export const flashPayloadSchema = z.looseObject({
    body: optionalText,
    gpt_body: optionalText,
    gpt_title: optionalText,
    link: optionalText,
    polished: z
        .boolean()
        .nullish()
        .transform((value) => value === true),
    publish_time: optionalText,
    score: z.unknown().optional(),
    source: optionalText,
    title: optionalText,
});

export const flashSchema = z.object({
    body: z.string().describe('The flash body text.'),
    gptBody: z.string().describe('Body rewritten by the polishing stage, empty when absent.'),
    gptTitle: z.string().describe('Title rewritten by the polishing stage, empty when absent.'),
    link: z.string().describe('Canonical source URL, empty when unknown.'),
    payload: z
        .record(z.string(), z.unknown())
        .describe('The complete upstream item, kept verbatim for round-trip retrieval.'),
    polished: z.boolean().describe('Whether the polishing stage rewrote this flash.'),
    publishTime: z.string().describe('Publication time as supplied upstream, not interpreted.'),
    score: z.instanceof(FlashScore).describe('Scores computed upstream.'),
    source: z.string().describe('Name of the reporting outlet.'),
    title: z.string().describe('Original headline. May be empty.'),
});

export type FlashProps = z.input<typeof flashSchema>;

/**
 * @description A scored news flash, either awaiting a duplicate decision or accepted into history
 */
export class Flash {
    public readonly body: string;
    public readonly gptBody: string;
    public readonly gptTitle: string;
    public readonly link: string;
    public readonly payload: Record<string, unknown>;
    public readonly polished: boolean;
    public readonly publishTime: string;
    public readonly score: FlashScore;
    public readonly source: string;
    public readonly title: string;

    public constructor(data: FlashProps) {
        const result = flashSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid flash data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.title = validatedData.title;
        this.body = validatedData.body;
        this.link = validatedData.link;
        this.source = validatedData.source;
        this.publishTime = validatedData.publishTime;
        this.score = validatedData.score;
        this.gptTitle = validatedData.gptTitle;
        this.gptBody = validatedData.gptBody;
        this.polished = validatedData.polished;
        this.payload = validatedData.payload;
    }

    /**
     * Builds a flash from an upstream item, keeping the item itself as the payload
     */
    public static fromPayload(payload: Record<string, unknown>): Flash {
        const result = flashPayloadSchema.safeParse(payload);

        if (!result.success) {
            throw new Error(`Invalid flash payload: ${result.error.message}`);
        }

        const item = result.data;
        return new Flash({
            body: item.body,
            gptBody: item.gpt_body,
            gptTitle: item.gpt_title,
            link: item.link,
            payload: { ...payload },
            polished: item.polished,
            publishTime: item.publish_time,
            score: FlashScore.fromPayload(item.score),
            source: item.source,
            title: item.title,
        });
    }

    public get titleFingerprint(): TitleFingerprint {
        return TitleFingerprint.fromTitle(this.title);
    }
}
