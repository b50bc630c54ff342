import { resolve } from 'node:path';

import { createContainer } from './di/container.js';

const DEFAULT_LEGACY_HISTORY_FILE = './news_history.json';

/**
 * Moves a legacy JSON history file into the SQLite history store.
 * Usage: `npm run history:import -- [path/to/news_history.json]`
 */
const run = async () => {
    const container = createContainer();
    const logger = container.get('Logger');
    const database = container.get('Database');
    const importLegacyHistory = container.get('ImportLegacyHistory');

    const filePath = resolve(process.argv[2] ?? DEFAULT_LEGACY_HISTORY_FILE);

    try {
        await database.connect();
        const importedCount = await importLegacyHistory.execute(filePath);
        logger.info('history:import:done', { filePath, importedCount });
    } catch (error) {
        logger.error('history:import:error', { error, filePath });
        process.exitCode = 1;
    } finally {
        await database.disconnect();
    }
};

void run();
