import { HTTPException } from 'hono/http-exception';
import { z } from 'zod/v4';

// Domain
import { Flash, flashPayloadSchema } from '../../../../domain/entities/flash.entity.js';

/**
 * A flash as posted by the generation stage. The item must satisfy the flash wire shape and is
 * kept whole as the flash payload.
 */
const flashItemSchema = z.record(z.string(), z.unknown()).transform((item, ctx) => {
    if (!flashPayloadSchema.safeParse(item).success) {
        ctx.addIssue({
            code: 'custom',
            message: 'Invalid flash: text fields must be strings and polished a boolean',
        });
        return z.NEVER;
    }

    return Flash.fromPayload(item);
});

const flashBatchBodySchema = z.object({
    commit: z.boolean().optional().default(false),
    flashes: z.array(flashItemSchema),
});

export type FlashBatchHttpParams = z.infer<typeof flashBatchBodySchema>;

/**
 * Validates POST bodies carrying a batch of flashes
 */
export class FlashBatchRequestHandler {
    /**
     * @throws HTTPException with 422 status for validation errors
     */
    handle(rawBody: unknown): FlashBatchHttpParams {
        const validatedBody = flashBatchBodySchema.safeParse(rawBody);

        if (!validatedBody.success) {
            throw new HTTPException(422, {
                cause: validatedBody.error,
                message: 'Invalid request body',
            });
        }

        return validatedBody.data;
    }
}
