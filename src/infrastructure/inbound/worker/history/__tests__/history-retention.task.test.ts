import { describe, expect, test } from 'vitest';
import { mock } from 'vitest-mock-extended';

import { type LoggerPort } from '../../../../../shared/logger/logger.port.js';

// Application
import { type PruneHistoryUseCase } from '../../../../../application/use-cases/history/prune-history.use-case.js';

import { HistoryRetentionTask } from '../history-retention.task.js';

describe('HistoryRetentionTask', () => {
    const config = { enabled: true, retentionDays: 14, schedule: '30 4 * * *' };

    test('should run on startup on the configured schedule', () => {
        // When
        const task = new HistoryRetentionTask(mock<PruneHistoryUseCase>(), config, mock<LoggerPort>());

        // Then
        expect(task.name).toBe('history-retention');
        expect(task.schedule).toBe('30 4 * * *');
        expect(task.executeOnStartup).toBe(true);
    });

    test('should prune with the configured retention period', async () => {
        // Given
        const pruneHistory = mock<PruneHistoryUseCase>();
        const logger = mock<LoggerPort>();
        pruneHistory.execute.mockResolvedValue(5);
        const task = new HistoryRetentionTask(pruneHistory, config, logger);

        // When
        await task.execute();

        // Then
        expect(pruneHistory.execute).toHaveBeenCalledWith(14);
        expect(logger.info).toHaveBeenCalledWith('History retention task completed', {
            deletedCount: 5,
        });
    });

    test('should let a pruning failure reach the worker', async () => {
        // Given
        const pruneHistory = mock<PruneHistoryUseCase>();
        pruneHistory.execute.mockRejectedValue(new Error('disk full'));
        const task = new HistoryRetentionTask(pruneHistory, config, mock<LoggerPort>());

        // When / Then
        await expect(task.execute()).rejects.toThrow('disk full');
    });
});
