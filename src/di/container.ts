import { Container, Injectable } from '@snap/ts-inject';
import { default as nodeConfiguration } from 'config';

import { type LoggerPort } from '../shared/logger/logger.port.js';
import { PinoLoggerAdapter } from '../shared/logger/pino-logger.adapter.js';

// Configuration
import type { ConfigurationPort } from '../application/ports/inbound/configuration.port.js';
import { NodeConfig } from '../infrastructure/inbound/configuration/node-config.js';

// Application
import type { ServerPort } from '../application/ports/inbound/server.port.js';
import type { TaskPort, WorkerPort } from '../application/ports/inbound/worker.port.js';
import type { FlashHistoryRepositoryPort } from '../application/ports/outbound/persistence/flash-history-repository.port.js';
import { DeduplicateFlashesUseCase } from '../application/use-cases/flashes/deduplicate-flashes.use-case.js';
import { FilterDuplicateFlashesUseCase } from '../application/use-cases/flashes/filter-duplicate-flashes.use-case.js';
import { RecordFlashesUseCase } from '../application/use-cases/flashes/record-flashes.use-case.js';
import { GetHistoryByDateUseCase } from '../application/use-cases/history/get-history-by-date.use-case.js';
import { GetHistoryStatsUseCase } from '../application/use-cases/history/get-history-stats.use-case.js';
import { GetTopScoredHistoryUseCase } from '../application/use-cases/history/get-top-scored-history.use-case.js';
import { ImportLegacyHistoryUseCase } from '../application/use-cases/history/import-legacy-history.use-case.js';
import { LookupHistoryUseCase } from '../application/use-cases/history/lookup-history.use-case.js';
import { PruneHistoryUseCase } from '../application/use-cases/history/prune-history.use-case.js';
import { SearchHistoryUseCase } from '../application/use-cases/history/search-history.use-case.js';

// Domain
import { FlashDuplicateMatcher } from '../domain/services/flash-duplicate-matcher.service.js';

// Infrastructure
import { HonoServer } from '../infrastructure/inbound/server/hono.server.js';
import { DeduplicateFlashesController } from '../infrastructure/inbound/server/flashes/deduplicate-flashes.controller.js';
import { RecordFlashesController } from '../infrastructure/inbound/server/flashes/record-flashes.controller.js';
import { HistoryController } from '../infrastructure/inbound/server/history/history.controller.js';
import { HistoryRetentionTask } from '../infrastructure/inbound/worker/history/history-retention.task.js';
import { NodeCronAdapter } from '../infrastructure/inbound/worker/node-cron.adapter.js';
import { SqliteFlashHistoryRepository } from '../infrastructure/outbound/persistence/flash-history/sqlite-flash-history.repository.js';
import { SqliteDatabase } from '../infrastructure/outbound/persistence/sqlite.database.js';

/**
 * Outbound adapters
 */
const databaseFactory = Injectable(
    'Database',
    ['Logger', 'Configuration'] as const,
    (logger: LoggerPort, config: ConfigurationPort) =>
        new SqliteDatabase(logger, config.getOutboundConfiguration().sqlite.databasePath),
);

const loggerFactory = Injectable(
    'Logger',
    ['Configuration'] as const,
    (config: ConfigurationPort): LoggerPort =>
        new PinoLoggerAdapter({
            level: config.getInboundConfiguration().logger.level,
            prettyPrint: config.getInboundConfiguration().logger.prettyPrint,
        }),
);

/**
 * Repository adapters
 */
const flashHistoryRepositoryFactory = Injectable(
    'FlashHistoryRepository',
    ['Database', 'Logger'] as const,
    (db: SqliteDatabase, logger: LoggerPort): FlashHistoryRepositoryPort => {
        logger.debug('Initializing flash history repository', { repository: 'SqliteFlashHistory' });
        return new SqliteFlashHistoryRepository(db, logger);
    },
);

/**
 * Domain services
 */
const duplicateMatcherFactory = Injectable('DuplicateMatcher', () => new FlashDuplicateMatcher());

/**
 * Use case factories
 */
const filterDuplicateFlashesUseCaseFactory = Injectable(
    'FilterDuplicateFlashes',
    ['FlashHistoryRepository', 'DuplicateMatcher', 'Configuration', 'Logger'] as const,
    (
        flashHistoryRepository: FlashHistoryRepositoryPort,
        duplicateMatcher: FlashDuplicateMatcher,
        config: ConfigurationPort,
        logger: LoggerPort,
    ) =>
        new FilterDuplicateFlashesUseCase(
            flashHistoryRepository,
            duplicateMatcher,
            config.getDeduplicationConfiguration(),
            logger,
        ),
);

const recordFlashesUseCaseFactory = Injectable(
    'RecordFlashes',
    ['FlashHistoryRepository', 'Logger'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort, logger: LoggerPort) =>
        new RecordFlashesUseCase(flashHistoryRepository, logger),
);

const deduplicateFlashesUseCaseFactory = Injectable(
    'DeduplicateFlashes',
    ['FilterDuplicateFlashes', 'RecordFlashes', 'Logger'] as const,
    (
        filterDuplicateFlashes: FilterDuplicateFlashesUseCase,
        recordFlashes: RecordFlashesUseCase,
        logger: LoggerPort,
    ) => new DeduplicateFlashesUseCase(filterDuplicateFlashes, recordFlashes, logger),
);

const pruneHistoryUseCaseFactory = Injectable(
    'PruneHistory',
    ['FlashHistoryRepository', 'Logger'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort, logger: LoggerPort) =>
        new PruneHistoryUseCase(flashHistoryRepository, logger),
);

const getHistoryStatsUseCaseFactory = Injectable(
    'GetHistoryStats',
    ['FlashHistoryRepository', 'Configuration'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort, config: ConfigurationPort) =>
        new GetHistoryStatsUseCase(flashHistoryRepository, config.getDeduplicationConfiguration()),
);

const searchHistoryUseCaseFactory = Injectable(
    'SearchHistory',
    ['FlashHistoryRepository'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort) =>
        new SearchHistoryUseCase(flashHistoryRepository),
);

const getHistoryByDateUseCaseFactory = Injectable(
    'GetHistoryByDate',
    ['FlashHistoryRepository', 'Configuration'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort, config: ConfigurationPort) =>
        new GetHistoryByDateUseCase(
            flashHistoryRepository,
            config.getInboundConfiguration().reporting.timezone,
        ),
);

const getTopScoredHistoryUseCaseFactory = Injectable(
    'GetTopScoredHistory',
    ['FlashHistoryRepository'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort) =>
        new GetTopScoredHistoryUseCase(flashHistoryRepository),
);

const lookupHistoryUseCaseFactory = Injectable(
    'LookupHistory',
    ['FlashHistoryRepository', 'Configuration'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort, config: ConfigurationPort) =>
        new LookupHistoryUseCase(flashHistoryRepository, config.getDeduplicationConfiguration()),
);

const importLegacyHistoryUseCaseFactory = Injectable(
    'ImportLegacyHistory',
    ['FlashHistoryRepository', 'Logger'] as const,
    (flashHistoryRepository: FlashHistoryRepositoryPort, logger: LoggerPort) =>
        new ImportLegacyHistoryUseCase(flashHistoryRepository, logger),
);

/**
 * Controller factories
 */
type Controllers = {
    deduplicateFlashes: DeduplicateFlashesController;
    history: HistoryController;
    recordFlashes: RecordFlashesController;
};

const controllersFactory = Injectable(
    'Controllers',
    [
        'DeduplicateFlashes',
        'RecordFlashes',
        'GetHistoryStats',
        'SearchHistory',
        'GetHistoryByDate',
        'GetTopScoredHistory',
        'LookupHistory',
    ] as const,
    (
        deduplicateFlashes: DeduplicateFlashesUseCase,
        recordFlashes: RecordFlashesUseCase,
        getHistoryStats: GetHistoryStatsUseCase,
        searchHistory: SearchHistoryUseCase,
        getHistoryByDate: GetHistoryByDateUseCase,
        getTopScoredHistory: GetTopScoredHistoryUseCase,
        lookupHistory: LookupHistoryUseCase,
    ): Controllers => ({
        deduplicateFlashes: new DeduplicateFlashesController(deduplicateFlashes),
        history: new HistoryController(
            getHistoryStats,
            searchHistory,
            getHistoryByDate,
            getTopScoredHistory,
            lookupHistory,
        ),
        recordFlashes: new RecordFlashesController(recordFlashes),
    }),
);

/**
 * Task factories
 */
const tasksFactory = Injectable(
    'Tasks',
    ['PruneHistory', 'Configuration', 'Logger'] as const,
    (
        pruneHistory: PruneHistoryUseCase,
        configuration: ConfigurationPort,
        logger: LoggerPort,
    ): TaskPort[] => {
        const tasks: TaskPort[] = [];

        const retentionConfig = configuration.getInboundConfiguration().tasks.historyRetention;
        if (retentionConfig.enabled) {
            tasks.push(new HistoryRetentionTask(pruneHistory, retentionConfig, logger));
        }

        return tasks;
    },
);

/**
 * Inbound adapters
 */
const configurationFactory = (overrides?: ContainerOverrides) =>
    Injectable('Configuration', (): ConfigurationPort => new NodeConfig(nodeConfiguration, overrides));

const serverFactory = Injectable(
    'Server',
    ['Logger', 'Controllers'] as const,
    (logger: LoggerPort, controllers: Controllers): ServerPort => {
        logger.debug('Initializing Server', { implementation: 'Hono' });
        return new HonoServer(
            logger,
            controllers.deduplicateFlashes,
            controllers.recordFlashes,
            controllers.history,
        );
    },
);

const workerFactory = Injectable(
    'Worker',
    ['Logger', 'Tasks'] as const,
    (logger: LoggerPort, tasks: TaskPort[]): WorkerPort => {
        logger.debug('Initializing Worker', { implementation: 'NodeCron' });
        return new NodeCronAdapter(logger, tasks);
    },
);

/**
 * Container configuration
 */
export type ContainerOverrides = {
    databasePath?: string;
};

export const createContainer = (overrides?: ContainerOverrides) =>
    Container
        // Outbound adapters
        .provides(configurationFactory(overrides))
        .provides(loggerFactory)
        .provides(databaseFactory)
        // Repositories and domain services
        .provides(flashHistoryRepositoryFactory)
        .provides(duplicateMatcherFactory)
        // Use cases
        .provides(filterDuplicateFlashesUseCaseFactory)
        .provides(recordFlashesUseCaseFactory)
        .provides(deduplicateFlashesUseCaseFactory)
        .provides(pruneHistoryUseCaseFactory)
        .provides(getHistoryStatsUseCaseFactory)
        .provides(searchHistoryUseCaseFactory)
        .provides(getHistoryByDateUseCaseFactory)
        .provides(getTopScoredHistoryUseCaseFactory)
        .provides(lookupHistoryUseCaseFactory)
        .provides(importLegacyHistoryUseCaseFactory)
        // Controllers and tasks
        .provides(controllersFactory)
        .provides(tasksFactory)
        // Inbound adapters
        .provides(serverFactory)
        .provides(workerFactory);
