import { HTTPException } from 'hono/http-exception';
import { z } from 'zod/v4';

// Application
import { type ReportingDay } from '../../../../application/use-cases/history/get-history-by-date.use-case.js';
import { type HistoryLookup } from '../../../../application/use-cases/history/lookup-history.use-case.js';

const DEFAULT_SEARCH_LIMIT = 20;
const DEFAULT_BY_DATE_LIMIT = 50;
const MAX_LIMIT = 200;
const DEFAULT_MIN_SCORE = 70;
const DEFAULT_TOP_DAYS = 7;

/**
 * Raw HTTP query parameters of the history endpoints
 */
export type HistoryHttpQuery = Record<string, string | undefined>;

const limitParamSchema = (defaultLimit: number) =>
    z.coerce.number().int().min(1).max(MAX_LIMIT).optional().default(defaultLimit);

/**
 * `YYYY-MM-DD`, checked to be a real calendar day
 */
const dateParamSchema = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Expected a date as YYYY-MM-DD' })
    .transform((value): ReportingDay => {
        const [year, month, day] = value.split('-').map(Number);
        return { day, month, year };
    })
    .refine(
        ({ day, month, year }) => {
            const date = new Date(Date.UTC(year, month - 1, day));
            return (
                date.getUTCFullYear() === year &&
                date.getUTCMonth() === month - 1 &&
                date.getUTCDate() === day
            );
        },
        { message: 'Not a calendar date' },
    );

const searchQuerySchema = z.object({
    limit: limitParamSchema(DEFAULT_SEARCH_LIMIT),
    q: z.string().trim().min(1, { message: 'A search keyword is required' }),
});

const byDateQuerySchema = z.object({
    date: dateParamSchema.optional(),
    limit: limitParamSchema(DEFAULT_BY_DATE_LIMIT),
});

const topScoredQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(365).optional().default(DEFAULT_TOP_DAYS),
    minScore: z.coerce.number().min(0).max(100).optional().default(DEFAULT_MIN_SCORE),
});

const lookupQuerySchema = z
    .object({
        link: z.string().trim().min(1).optional(),
        title: z.string().trim().min(1).optional(),
    })
    .transform((query, ctx): HistoryLookup => {
        if (query.link) return { link: query.link };
        if (query.title) return { title: query.title };

        ctx.addIssue({ code: 'custom', message: 'Either link or title is required' });
        return z.NEVER;
    });

/**
 * Validates the query strings of the history endpoints
 */
export class HistoryRequestHandler {
    handleByDate(rawQuery: HistoryHttpQuery): z.infer<typeof byDateQuerySchema> {
        return this.parse(byDateQuerySchema, rawQuery);
    }

    handleLookup(rawQuery: HistoryHttpQuery): HistoryLookup {
        return this.parse(lookupQuerySchema, rawQuery);
    }

    handleSearch(rawQuery: HistoryHttpQuery): { keyword: string; limit: number } {
        const { limit, q } = this.parse(searchQuerySchema, rawQuery);
        return { keyword: q, limit };
    }

    handleTopScored(rawQuery: HistoryHttpQuery): z.infer<typeof topScoredQuerySchema> {
        return this.parse(topScoredQuerySchema, rawQuery);
    }

    /**
     * @throws HTTPException with 422 status for validation errors
     */
    private parse<T extends z.ZodType>(schema: T, rawQuery: HistoryHttpQuery): z.output<T> {
        const validatedParams = schema.safeParse(rawQuery);

        if (!validatedParams.success) {
            throw new HTTPException(422, {
                cause: validatedParams.error,
                message: 'Invalid request parameters',
            });
        }

        return validatedParams.data;
    }
}
