import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Application
import { type DatabasePort } from '../../../application/ports/outbound/persistence/database.port.js';
import { StorageFailureError } from '../../../application/ports/outbound/persistence/storage-failure.error.js';

import { FLASH_HISTORY_SCHEMA } from './sqlite.schema.js';

const IN_MEMORY = ':memory:';

/**
 * better-sqlite3 connection holder. The connection opens lazily and can be reopened after
 * `disconnect`; nothing read from it is cached here.
 */
export class SqliteDatabase implements DatabasePort {
    private connection: Database.Database | null = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly databasePath: string,
    ) {}

    async connect(): Promise<void> {
        this.getConnection();
    }

    async disconnect(): Promise<void> {
        if (!this.connection) return;

        try {
            this.connection.close();
            this.logger.info('Database connection closed', { databasePath: this.databasePath });
        } finally {
            this.connection = null;
        }
    }

    getConnection(): Database.Database {
        if (this.connection) return this.connection;

        try {
            this.connection = this.open();
        } catch (error) {
            throw new StorageFailureError('connect', error);
        }

        return this.connection;
    }

    private open(): Database.Database {
        this.logger.info('Opening SQLite database', { databasePath: this.databasePath });

        if (this.databasePath !== IN_MEMORY) {
            mkdirSync(dirname(this.databasePath), { recursive: true });
        }

        const connection = new Database(this.databasePath);
        try {
            connection.pragma('busy_timeout = 5000');
            connection.pragma('journal_mode = WAL');
            connection.pragma('synchronous = NORMAL');
            connection.exec(FLASH_HISTORY_SCHEMA);
        } catch (error) {
            connection.close();
            throw error;
        }

        return connection;
    }
}
