import pino, { type Logger } from 'pino';

import { type LoggerLevel, type LoggerMeta, type LoggerPort } from './logger.port.js';

export interface PinoLoggerConfiguration {
    level: LoggerLevel;
    prettyPrint: boolean;
}

/**
 * Pino-backed logger. Errors passed under the `error` key are serialized with their stack.
 */
export class PinoLoggerAdapter implements LoggerPort {
    private readonly logger: Logger;

    constructor(configuration: PinoLoggerConfiguration) {
        this.logger = pino({
            level: configuration.level,
            serializers: {
                error: pino.stdSerializers.err,
            },
            transport: configuration.prettyPrint
                ? {
                      options: { colorize: true, ignore: 'pid,hostname' },
                      target: 'pino-pretty',
                  }
                : undefined,
        });
    }

    public debug(message: string, meta?: LoggerMeta): void {
        this.logger.debug(meta ?? {}, message);
    }

    public error(message: string, meta?: LoggerMeta): void {
        this.logger.error(meta ?? {}, message);
    }

    public info(message: string, meta?: LoggerMeta): void {
        this.logger.info(meta ?? {}, message);
    }

    public warn(message: string, meta?: LoggerMeta): void {
        this.logger.warn(meta ?? {}, message);
    }
}
