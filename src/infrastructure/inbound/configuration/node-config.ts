import { z } from 'zod/v4';

import { loggerLevelSchema } from '../../../shared/logger/logger.port.js';

// Configuration
import {
    type ConfigurationPort,
    type DeduplicationConfigurationPort,
    type InboundConfigurationPort,
    type OutboundConfigurationPort,
} from '../../../application/ports/inbound/configuration.port.js';

const timeZoneSchema = z.string().refine(
    (timeZone) => {
        try {
            new Intl.DateTimeFormat('en-US', { timeZone });
            return true;
        } catch {
            return false;
        }
    },
    { message: 'Unknown IANA time zone' },
);

const configurationSchema = z.object({
    deduplication: z.object({
        foldBatchCandidates: z.boolean().optional().default(false),
        historyHours: z.coerce.number().positive(),
        similarityThreshold: z.coerce.number().min(0).max(1),
    }),
    inbound: z.object({
        env: z.enum(['development', 'production', 'test']),
        http: z.object({
            host: z.string(),
            port: z.coerce.number().int().positive(),
        }),
        logger: z.object({
            level: loggerLevelSchema,
            prettyPrint: z.boolean(),
        }),
        reporting: z.object({
            timezone: timeZoneSchema,
        }),
        tasks: z.object({
            historyRetention: z.object({
                enabled: z.boolean(),
                retentionDays: z.coerce.number().int().positive(),
                schedule: z.string().min(1),
            }),
        }),
    }),
    outbound: z.object({
        sqlite: z.object({
            databasePath: z.string().min(1),
        }),
    }),
});

type Configuration = z.infer<typeof configurationSchema>;

/**
 * Node.js configuration loader backed by node-config
 */
export class NodeConfig implements ConfigurationPort {
    private readonly configuration: Configuration;

    constructor(configurationInput: unknown, overrides?: { databasePath?: string }) {
        const parsed = configurationSchema.parse(configurationInput);

        if (overrides?.databasePath) {
            parsed.outbound.sqlite.databasePath = overrides.databasePath;
        }

        this.configuration = parsed;
    }

    public getDeduplicationConfiguration(): DeduplicationConfigurationPort {
        return this.configuration.deduplication;
    }

    public getInboundConfiguration(): InboundConfigurationPort {
        return this.configuration.inbound;
    }

    public getOutboundConfiguration(): OutboundConfigurationPort {
        return this.configuration.outbound;
    }
}
