import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { mock, type MockProxy } from 'vitest-mock-extended';

// Ports
import { type FlashHistoryRepositoryPort } from '../../../ports/outbound/persistence/flash-history-repository.port.js';

import { GetHistoryByDateUseCase } from '../get-history-by-date.use-case.js';

describe('GetHistoryByDateUseCase', () => {
    let flashHistoryRepository: MockProxy<FlashHistoryRepositoryPort>;

    beforeEach(() => {
        vi.useFakeTimers();
        flashHistoryRepository = mock<FlashHistoryRepositoryPort>();
        flashHistoryRepository.findCreatedBetween.mockResolvedValue([]);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    test('should cover the requested day from local midnight to local midnight', async () => {
        // Given
        const useCase = new GetHistoryByDateUseCase(flashHistoryRepository, 'Asia/Shanghai');

        // When
        await useCase.execute({ date: { day: 8, month: 3, year: 2024 }, limit: 50 });

        // Then
        expect(flashHistoryRepository.findCreatedBetween).toHaveBeenCalledWith({
            from: new Date('2024-03-07T16:00:00.000Z'),
            limit: 50,
            to: new Date('2024-03-08T16:00:00.000Z'),
        });
    });

    test('should default to today in the reporting time zone', async () => {
        // Given - 20:00 UTC is already the next day in Shanghai
        vi.setSystemTime(new Date('2024-03-08T20:00:00.000Z'));
        const useCase = new GetHistoryByDateUseCase(flashHistoryRepository, 'Asia/Shanghai');

        // When
        await useCase.execute({ limit: 10 });

        // Then
        expect(flashHistoryRepository.findCreatedBetween).toHaveBeenCalledWith({
            from: new Date('2024-03-08T16:00:00.000Z'),
            limit: 10,
            to: new Date('2024-03-09T16:00:00.000Z'),
        });
    });

    test('should use UTC days when configured so', async () => {
        // Given
        const useCase = new GetHistoryByDateUseCase(flashHistoryRepository, 'UTC');

        // When
        await useCase.execute({ date: { day: 29, month: 2, year: 2024 }, limit: 50 });

        // Then
        expect(flashHistoryRepository.findCreatedBetween).toHaveBeenCalledWith({
            from: new Date('2024-02-29T00:00:00.000Z'),
            limit: 50,
            to: new Date('2024-03-01T00:00:00.000Z'),
        });
    });
});
