import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod/v4';

import type { LoggerPort } from '../../../shared/logger/logger.port.js';

// Application
import { StorageFailureError } from '../../../application/ports/outbound/persistence/storage-failure.error.js';

/**
 * Creates a global error handling middleware for Hono
 * Catches all unhandled errors and returns appropriate HTTP responses
 */
export const createErrorHandlerMiddleware = (logger: LoggerPort) => {
    return async (err: Error, c: Context) => {
        // Handle HTTP exceptions (like validation errors)
        if (err instanceof HTTPException) {
            logger.warn('Rejected HTTP request', {
                error: err.message,
                path: c.req.path,
                status: err.status,
            });
            const details = err.cause instanceof ZodError ? err.cause.issues : undefined;
            return c.json({ details, error: err.message }, err.status);
        }

        if (err instanceof StorageFailureError) {
            logger.error('History storage unavailable', { error: err, path: c.req.path });
            return c.json({ error: 'History storage unavailable' }, 503);
        }

        logger.error('Unexpected error in HTTP handler', { error: err, path: c.req.path });
        return c.json({ error: 'Internal server error' }, 500);
    };
};
