import { type LoggerLevel } from '../../../shared/logger/logger.port.js';

/**
 * Configuration port providing access to application settings
 */
export interface ConfigurationPort {
    /**
     * Get the deduplication settings
     */
    getDeduplicationConfiguration(): DeduplicationConfigurationPort;

    /**
     * Get the inbound configuration
     */
    getInboundConfiguration(): InboundConfigurationPort;

    /**
     * Get the outbound configuration
     */
    getOutboundConfiguration(): OutboundConfigurationPort;
}

/**
 * Duplicate detection settings
 */
export interface DeduplicationConfigurationPort {
    /**
     * Compare each flash with flashes accepted earlier in the same batch
     */
    foldBatchCandidates: boolean;
    historyHours: number;
    similarityThreshold: number;
}

/**
 * History retention task configuration
 */
export interface HistoryRetentionTaskConfig {
    enabled: boolean;
    retentionDays: number;
    schedule: string;
}

/**
 * Inbound configuration (defined by the user)
 */
export interface InboundConfigurationPort {
    env: 'development' | 'production' | 'test';
    http: {
        host: string;
        port: number;
    };
    logger: {
        level: LoggerLevel;
        prettyPrint: boolean;
    };
    reporting: {
        timezone: string;
    };
    tasks: {
        historyRetention: HistoryRetentionTaskConfig;
    };
}

/**
 * Outbound configuration (defined by external services)
 */
export interface OutboundConfigurationPort {
    sqlite: {
        databasePath: string;
    };
}
