import { subHours } from 'date-fns';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import {
    cleanupIntegrationContext,
    createIntegrationContext,
    executeRequest,
    type IntegrationContext,
    seedHistoryRecord,
    startIntegrationContext,
    stopIntegrationContext,
} from './setup/integration.js';

/**
 * Integration tests for the read-only /history routes.
 * The test configuration reports days in UTC.
 */
describe('Server /history routes – integration', () => {
    let integrationContext: IntegrationContext;

    beforeAll(async () => {
        integrationContext = await createIntegrationContext();
    });

    afterAll(async () => {
        await cleanupIntegrationContext(integrationContext);
    });

    beforeEach(async () => {
        await startIntegrationContext(integrationContext);
        seedHistoryRecord(integrationContext, {
            createdAt: subHours(new Date(), 2),
            link: 'https://news.example/halving',
            title: 'Halving countdown enters final week',
            total: 82,
        });
        seedHistoryRecord(integrationContext, {
            createdAt: subHours(new Date(), 30),
            link: 'https://news.example/fees',
            title: 'Layer-2 fees hit yearly low',
            total: 58,
        });
    });

    afterEach(async () => {
        await stopIntegrationContext(integrationContext);
    });

    it('should report history figures with the active settings', async () => {
        // When
        const response = await executeRequest(integrationContext, '/history/stats');

        // Then
        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({
            averageScore: 70,
            historyHours: 24,
            polishedCount: 0,
            recordsInWindow: 1,
            similarityThreshold: 0.7,
            totalRecords: 2,
        });
    });

    it('should search titles by keyword', async () => {
        // When
        const response = await executeRequest(integrationContext, '/history/search?q=HALVING');

        // Then
        expect(await response.json()).toMatchObject({
            items: [{ flash: { title: 'Halving countdown enters final week' } }],
            total: 1,
        });
    });

    it('should reject a search without keyword', async () => {
        // When
        const response = await executeRequest(integrationContext, '/history/search');

        // Then
        expect(response.status).toBe(422);
    });

    it('should list top scored flashes of the last days', async () => {
        // When
        const response = await executeRequest(integrationContext, '/history/top?minScore=80&days=3');

        // Then
        expect(await response.json()).toMatchObject({
            items: [{ flash: { link: 'https://news.example/halving' } }],
            total: 1,
        });
    });

    it('should list the flashes of one reporting day', async () => {
        // Given
        seedHistoryRecord(integrationContext, {
            createdAt: new Date('2024-03-08T23:59:59.000Z'),
            link: 'https://news.example/day',
            title: 'Late night listing',
            total: 40,
        });

        // When
        const sameDay = await executeRequest(integrationContext, '/history/by-date?date=2024-03-08');
        const nextDay = await executeRequest(integrationContext, '/history/by-date?date=2024-03-09');

        // Then
        expect(await sameDay.json()).toMatchObject({
            items: [{ flash: { title: 'Late night listing' } }],
            total: 1,
        });
        expect(await nextDay.json()).toEqual({ items: [], total: 0 });
    });

    it('should tell whether a link was seen within the window', async () => {
        // When
        const recent = await executeRequest(
            integrationContext,
            `/history/lookup?link=${encodeURIComponent('https://news.example/halving')}`,
        );
        const stale = await executeRequest(
            integrationContext,
            `/history/lookup?link=${encodeURIComponent('https://news.example/fees')}`,
        );

        // Then
        expect(await recent.json()).toMatchObject({
            found: true,
            record: { flash: { title: 'Halving countdown enters final week' } },
        });
        expect(await stale.json()).toEqual({ found: false, record: null });
    });

    it('should look a title up regardless of case', async () => {
        // When
        const response = await executeRequest(
            integrationContext,
            `/history/lookup?title=${encodeURIComponent('HALVING COUNTDOWN ENTERS FINAL WEEK')}`,
        );

        // Then
        expect(await response.json()).toMatchObject({ found: true });
    });

    it('should reject a lookup with neither link nor title', async () => {
        // When
        const response = await executeRequest(integrationContext, '/history/lookup');

        // Then
        expect(response.status).toBe(422);
    });
});
