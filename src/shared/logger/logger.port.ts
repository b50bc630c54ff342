import { z } from 'zod/v4';

export const loggerLevelSchema = z.enum(['debug', 'error', 'fatal', 'info', 'silent', 'trace', 'warn']);

export type LoggerLevel = z.infer<typeof loggerLevelSchema>;

export type LoggerMeta = Record<string, unknown>;

/**
 * Structured logger used across every layer
 */
export interface LoggerPort {
    debug(message: string, meta?: LoggerMeta): void;
    error(message: string, meta?: LoggerMeta): void;
    info(message: string, meta?: LoggerMeta): void;
    warn(message: string, meta?: LoggerMeta): void;
}
