import { readFile } from 'node:fs/promises';
import { z } from 'zod/v4';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Domain
import { Flash } from '../../../domain/entities/flash.entity.js';

// Ports
import {
    type ArchivedFlash,
    type FlashHistoryRepositoryPort,
} from '../../ports/outbound/persistence/flash-history-repository.port.js';

const legacyText = z
    .string()
    .nullish()
    .transform((value) => value ?? '');

/**
 * Whole-file history written by the earlier JSON-based deduplicator
 */
const legacyHistorySchema = z.object({
    news: z
        .array(
            z.looseObject({
                added_at: legacyText,
                link: legacyText,
                title: legacyText,
            }),
        )
        .nullish()
        .transform((entries) => entries ?? []),
});

export type LegacyHistoryEntry = z.infer<typeof legacyHistorySchema>['news'][number];

/**
 * Use case for moving a legacy JSON history file into the history store
 * @description Entries keep their original `added_at` as creation time so they age out of the
 * window and the retention period as they would have.
 */
export class ImportLegacyHistoryUseCase {
    constructor(
        private readonly flashHistoryRepository: FlashHistoryRepositoryPort,
        private readonly logger: LoggerPort,
    ) {}

    /**
     * @returns The number of imported entries, 0 when the file is missing or unreadable
     */
    public async execute(filePath: string): Promise<number> {
        const content = await this.readLegacyFile(filePath);
        if (content === null) {
            return 0;
        }

        let parsedJson: unknown;
        try {
            parsedJson = JSON.parse(content);
        } catch (error) {
            this.logger.error('Legacy history file is not valid JSON', { error, filePath });
            return 0;
        }

        const parsed = legacyHistorySchema.safeParse(parsedJson);
        if (!parsed.success) {
            this.logger.error('Legacy history file has an unexpected shape', {
                filePath,
                issues: parsed.error.issues,
            });
            return 0;
        }

        if (parsed.data.news.length === 0) {
            this.logger.info('No legacy records to import', { filePath });
            return 0;
        }

        const importedAt = new Date();
        const entries = parsed.data.news.map((entry) => this.toArchivedFlash(entry, importedAt));
        const importedCount = await this.flashHistoryRepository.importArchived(entries);

        this.logger.info('Legacy history imported', { filePath, importedCount });

        return importedCount;
    }

    private async readLegacyFile(filePath: string): Promise<null | string> {
        try {
            return await readFile(filePath, 'utf-8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                this.logger.warn('Legacy history file not found', { filePath });
                return null;
            }
            this.logger.error('Legacy history file could not be read', { error, filePath });
            return null;
        }
    }

    private toArchivedFlash(entry: LegacyHistoryEntry, importedAt: Date): ArchivedFlash {
        const addedAt = entry.added_at ? new Date(entry.added_at) : null;
        const createdAt = addedAt && !Number.isNaN(addedAt.getTime()) ? addedAt : importedAt;

        return {
            createdAt,
            flash: Flash.fromPayload({
                body: '',
                link: entry.link,
                polished: false,
                publish_time: entry.added_at,
                score: { total: 0 },
                source: '',
                title: entry.title,
            }),
        };
    }
}
