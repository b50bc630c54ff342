import { subHours } from 'date-fns';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import {
    cleanupIntegrationContext,
    countHistoryRecords,
    createIntegrationContext,
    executeRequest,
    type IntegrationContext,
    seedHistoryRecord,
    startIntegrationContext,
    stopIntegrationContext,
} from './setup/integration.js';

/**
 * Integration tests for the /flashes routes.
 * History lives in a temporary SQLite file; nothing leaves the process.
 */
describe('Server /flashes routes – integration', () => {
    let integrationContext: IntegrationContext;

    const seenFlash = {
        link: 'https://news.example/etf-inflows',
        title: 'Spot ETF inflows top $1B',
    };
    const sameLinkFlash = {
        body: 'Follow-up on the same story.',
        link: 'https://news.example/etf-inflows',
        score: { total: 74 },
        title: 'Inflows continue',
    };
    const similarTitleFlash = {
        body: 'Another outlet reports the same figure.',
        link: 'https://other.example/etf',
        score: { total: 70 },
        title: 'Spot ETF inflows top $1B today',
    };
    const freshFlash = {
        body: 'The upgrade goes live next week.',
        link: 'https://news.example/upgrade',
        publish_time: '2024-03-08 10:00',
        score: { authority: 25, importance: 30, timeliness: 15, total: 88, trending: 18 },
        source: 'Example Wire',
        title: 'Network upgrade date confirmed',
    };

    beforeAll(async () => {
        integrationContext = await createIntegrationContext();
    });

    afterAll(async () => {
        await cleanupIntegrationContext(integrationContext);
    });

    beforeEach(async () => {
        await startIntegrationContext(integrationContext);
        seedHistoryRecord(integrationContext, {
            ...seenFlash,
            createdAt: subHours(new Date(), 1),
        });
    });

    afterEach(async () => {
        await stopIntegrationContext(integrationContext);
    });

    describe('POST /flashes/deduplicate', () => {
        it('should split a batch against recent history without writing it', async () => {
            // When
            const response = await executeRequest(integrationContext, '/flashes/deduplicate', {
                body: { flashes: [sameLinkFlash, freshFlash, similarTitleFlash] },
                method: 'POST',
            });

            // Then
            expect(response.status).toBe(200);
            expect(await response.json()).toEqual({
                duplicates: [
                    {
                        flash: sameLinkFlash,
                        kind: 'LINK',
                        reason: 'Link duplicate: https://news.example/etf-inflows...',
                        similarity: null,
                    },
                    {
                        flash: similarTitleFlash,
                        kind: 'TITLE',
                        reason: 'Title similar (89%): Spot ETF inflows top $1B...',
                        similarity: 48 / 54,
                    },
                ],
                newFlashes: [freshFlash],
                recordedCount: 0,
            });
            expect(countHistoryRecords(integrationContext)).toBe(1);
        });

        it('should commit new flashes so that a replayed batch is fully duplicate', async () => {
            // Given
            const request = {
                body: { commit: true, flashes: [freshFlash] },
                method: 'POST',
            };

            // When
            const first = await executeRequest(integrationContext, '/flashes/deduplicate', request);
            const replay = await executeRequest(integrationContext, '/flashes/deduplicate', request);

            // Then
            expect(await first.json()).toMatchObject({ newFlashes: [freshFlash], recordedCount: 1 });
            expect(await replay.json()).toMatchObject({
                duplicates: [{ reason: 'Link duplicate: https://news.example/upgrade...' }],
                newFlashes: [],
                recordedCount: 0,
            });
            expect(countHistoryRecords(integrationContext)).toBe(2);
        });

        it('should record a flash once when two commits arrive together', async () => {
            // Given
            const request = {
                body: { commit: true, flashes: [freshFlash] },
                method: 'POST',
            };

            // When
            const responses = await Promise.all([
                executeRequest(integrationContext, '/flashes/deduplicate', request),
                executeRequest(integrationContext, '/flashes/deduplicate', request),
            ]);
            const bodies = await Promise.all(responses.map((response) => response.json()));

            // Then
            expect(bodies).toEqual(
                expect.arrayContaining([
                    expect.objectContaining({ recordedCount: 1 }),
                    expect.objectContaining({ newFlashes: [], recordedCount: 0 }),
                ]),
            );
            expect(countHistoryRecords(integrationContext)).toBe(2);
        });

        it('should ignore history older than the window', async () => {
            // Given
            seedHistoryRecord(integrationContext, {
                createdAt: subHours(new Date(), 25),
                link: freshFlash.link,
                title: freshFlash.title,
            });

            // When
            const response = await executeRequest(integrationContext, '/flashes/deduplicate', {
                body: { flashes: [freshFlash] },
                method: 'POST',
            });

            // Then
            expect(await response.json()).toMatchObject({ duplicates: [], newFlashes: [freshFlash] });
        });

        it('should reject an invalid batch with 422', async () => {
            // When
            const response = await executeRequest(integrationContext, '/flashes/deduplicate', {
                body: { flashes: [{ title: 42 }] },
                method: 'POST',
            });

            // Then
            expect(response.status).toBe(422);
            expect(await response.json()).toMatchObject({ error: 'Invalid request body' });
        });

        it('should reject a flash with a numeric polished flag with 422', async () => {
            // When
            const response = await executeRequest(integrationContext, '/flashes/history', {
                body: { flashes: [{ polished: 1, title: 'Miner reserves fall' }] },
                method: 'POST',
            });

            // Then
            expect(response.status).toBe(422);
            expect(countHistoryRecords(integrationContext)).toBe(1);
        });

        it('should reject a body that is not JSON with 400', async () => {
            // When
            const response = await executeRequest(integrationContext, '/flashes/deduplicate', {
                body: '{"flashes": [',
                method: 'POST',
            });

            // Then
            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({ error: 'Request body is not valid JSON' });
        });
    });

    describe('POST /flashes/history', () => {
        it('should record the flashes as given and return the new records', async () => {
            // When
            const response = await executeRequest(integrationContext, '/flashes/history', {
                body: { flashes: [freshFlash, similarTitleFlash] },
                method: 'POST',
            });

            // Then
            expect(response.status).toBe(201);
            expect(await response.json()).toEqual({
                recordedCount: 2,
                records: [
                    {
                        createdAt: expect.any(String),
                        flash: freshFlash,
                        id: expect.any(Number),
                        titleFingerprint: expect.stringMatching(/^[0-9a-f]{32}$/),
                    },
                    {
                        createdAt: expect.any(String),
                        flash: similarTitleFlash,
                        id: expect.any(Number),
                        titleFingerprint: expect.stringMatching(/^[0-9a-f]{32}$/),
                    },
                ],
            });
            expect(countHistoryRecords(integrationContext)).toBe(3);
        });
    });
});
