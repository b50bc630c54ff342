import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { mock, type MockProxy } from 'vitest-mock-extended';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Domain
import { getMockFlash, getMockHistoryRecord } from '../../../../domain/entities/__mocks__/flashes.mock.js';
import { FlashDuplicateMatcher } from '../../../../domain/services/flash-duplicate-matcher.service.js';

// Ports
import { type DeduplicationConfigurationPort } from '../../../ports/inbound/configuration.port.js';
import { type FlashHistoryRepositoryPort } from '../../../ports/outbound/persistence/flash-history-repository.port.js';
import { StorageFailureError } from '../../../ports/outbound/persistence/storage-failure.error.js';

import { FilterDuplicateFlashesUseCase } from '../filter-duplicate-flashes.use-case.js';

describe('FilterDuplicateFlashesUseCase', () => {
    const NOW = new Date('2024-03-08T12:00:00.000Z');
    const DEFAULT_SETTINGS: DeduplicationConfigurationPort = {
        foldBatchCandidates: false,
        historyHours: 24,
        similarityThreshold: 0.7,
    };

    let flashHistoryRepository: MockProxy<FlashHistoryRepositoryPort>;
    let logger: LoggerPort;

    const createUseCase = (settings: Partial<DeduplicationConfigurationPort> = {}) =>
        new FilterDuplicateFlashesUseCase(
            flashHistoryRepository,
            new FlashDuplicateMatcher(),
            { ...DEFAULT_SETTINGS, ...settings },
            logger,
        );

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(NOW);
        flashHistoryRepository = mock<FlashHistoryRepositoryPort>();
        logger = mock<LoggerPort>();
        flashHistoryRepository.findWithinWindow.mockResolvedValue([]);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    test('should return empty results for an empty batch without reading history', async () => {
        // When
        const result = await createUseCase().execute([]);

        // Then
        expect(result).toEqual({ duplicates: [], newFlashes: [] });
        expect(flashHistoryRepository.findWithinWindow).not.toHaveBeenCalled();
    });

    test('should read the window starting the configured number of hours ago', async () => {
        // When
        await createUseCase({ historyHours: 6 }).execute([getMockFlash()]);

        // Then
        expect(flashHistoryRepository.findWithinWindow).toHaveBeenCalledWith(
            new Date('2024-03-08T06:00:00.000Z'),
        );
    });

    test('should split the batch in input order and explain each duplicate', async () => {
        // Given
        flashHistoryRepository.findWithinWindow.mockResolvedValue([
            getMockHistoryRecord({ link: 'https://news.example/etf', title: 'ETF flows surge' }),
        ]);
        const sameLink = getMockFlash({ link: 'https://news.example/etf', title: 'Another angle' });
        const similarTitle = getMockFlash({ link: 'https://news.example/b', title: 'ETF flows surge!' });
        const unique = getMockFlash({ link: 'https://news.example/c', title: 'Miner reserves drop' });
        const alsoUnique = getMockFlash({ link: 'https://news.example/d', title: 'Options expiry looms' });

        // When
        const result = await createUseCase().execute([sameLink, unique, similarTitle, alsoUnique]);

        // Then
        expect(result.newFlashes).toEqual([unique, alsoUnique]);
        expect(result.duplicates.map(({ flash, reason }) => ({ flash, reason }))).toEqual([
            { flash: sameLink, reason: 'Link duplicate: https://news.example/etf...' },
            { flash: similarTitle, reason: 'Title similar (97%): ETF flows surge...' },
        ]);
        expect(result.duplicates[1].verdict.kind).toBe('TITLE');
    });

    test('should not compare flashes of the same batch with each other by default', async () => {
        // Given
        const first = getMockFlash({ link: 'https://news.example/1', title: 'Stablecoin supply hits record' });
        const second = getMockFlash({ link: 'https://news.example/2', title: 'Stablecoin supply hits record' });

        // When
        const result = await createUseCase().execute([first, second]);

        // Then
        expect(result.newFlashes).toEqual([first, second]);
        expect(result.duplicates).toEqual([]);
    });

    test('should compare against flashes accepted earlier in the batch when folding is enabled', async () => {
        // Given
        const first = getMockFlash({ link: 'https://news.example/1', title: 'Stablecoin supply hits record' });
        const second = getMockFlash({ link: 'https://news.example/2', title: 'Stablecoin supply hits record' });

        // When
        const result = await createUseCase({ foldBatchCandidates: true }).execute([first, second]);

        // Then
        expect(result.newFlashes).toEqual([first]);
        expect(result.duplicates.map(({ reason }) => reason)).toEqual([
            'Title similar (100%): Stablecoin supply hits record...',
        ]);
    });

    test('should propagate a storage failure', async () => {
        // Given
        flashHistoryRepository.findWithinWindow.mockRejectedValue(
            new StorageFailureError('findWithinWindow', new Error('disk I/O error')),
        );

        // When
        const result = createUseCase().execute([getMockFlash()]);

        // Then
        await expect(result).rejects.toThrow(
            'History storage failed during findWithinWindow: disk I/O error',
        );
    });
});
