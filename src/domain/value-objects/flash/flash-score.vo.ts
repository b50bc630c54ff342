import { z } from 'zod/v4';

export const flashScoreSchema = z.object({
    authority: z.number().int(),
    importance: z.number().int(),
    timeliness: z.number().int(),
    total: z.number().int(),
    trending: z.number().int(),
});

export type FlashScoreProps = z.infer<typeof flashScoreSchema>;

type ScoreComponent = keyof FlashScoreProps;

const SCORE_COMPONENTS: ScoreComponent[] = [
    'authority',
    'importance',
    'timeliness',
    'total',
    'trending',
];

/**
 * @description
 * Scores computed upstream for a flash. Carried through for reporting, never recomputed.
 *
 * @example
 * const score = FlashScore.fromPayload({ importance: 30, total: 82 });
 */
export class FlashScore {
    public readonly authority: number;
    public readonly importance: number;
    public readonly timeliness: number;
    public readonly total: number;
    public readonly trending: number;

    constructor(props: Partial<FlashScoreProps> = {}) {
        const result = flashScoreSchema.safeParse({
            authority: props.authority ?? 0,
            importance: props.importance ?? 0,
            timeliness: props.timeliness ?? 0,
            total: props.total ?? 0,
            trending: props.trending ?? 0,
        });

        if (!result.success) {
            throw new Error(`Invalid flash score: ${result.error.message}`);
        }

        this.authority = result.data.authority;
        this.importance = result.data.importance;
        this.timeliness = result.data.timeliness;
        this.total = result.data.total;
        this.trending = result.data.trending;
    }

    /**
     * Reads the `score` field of an upstream payload. A bare number is the total; an object
     * contributes its numeric components; anything else scores zero. Fractions are rounded.
     */
    public static fromPayload(value: unknown): FlashScore {
        if (typeof value === 'number' && Number.isFinite(value)) {
            return new FlashScore({ total: Math.round(value) });
        }

        if (typeof value !== 'object' || value === null || Array.isArray(value)) {
            return new FlashScore();
        }

        const props: Partial<FlashScoreProps> = {};
        for (const component of SCORE_COMPONENTS) {
            const raw: unknown = Reflect.get(value, component);
            if (typeof raw === 'number' && Number.isFinite(raw)) {
                props[component] = Math.round(raw);
            }
        }

        return new FlashScore(props);
    }

    public toJSON(): FlashScoreProps {
        return {
            authority: this.authority,
            importance: this.importance,
            timeliness: this.timeliness,
            total: this.total,
            trending: this.trending,
        };
    }
}
