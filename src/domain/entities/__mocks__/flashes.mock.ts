import { TitleFingerprint } from '../../value-objects/flash/title-fingerprint.vo.js';
import { Flash } from '../flash.entity.js';
import { HistoryRecord } from '../history-record.entity.js';

/**
 * Generates a single mock `Flash`. The payload mirrors the typed fields in upstream keys.
 */
export function getMockFlash(options?: {
    body?: string;
    link?: string;
    source?: string;
    title?: string;
    total?: number;
}): Flash {
    return Flash.fromPayload({
        body: options?.body ?? 'Spot inflows accelerated during the Asian session.',
        link: options?.link ?? '',
        publish_time: '2024-03-08 09:15',
        score: {
            authority: 20,
            importance: 25,
            timeliness: 15,
            total: options?.total ?? 80,
            trending: 20,
        },
        source: options?.source ?? 'Mock Wire',
        title: options?.title ?? 'Mock flash headline',
    });
}

/**
 * Generates a mock `HistoryRecord` wrapping `getMockFlash`.
 */
export function getMockHistoryRecord(options?: {
    createdAt?: Date;
    id?: number;
    link?: string;
    title?: string;
}): HistoryRecord {
    const flash = getMockFlash({ link: options?.link, title: options?.title });
    const createdAt = options?.createdAt ?? new Date();
    return new HistoryRecord({
        createdAt,
        flash,
        id: options?.id ?? 1,
        titleFingerprint: TitleFingerprint.fromTitle(flash.title),
        updatedAt: createdAt,
    });
}

/**
 * Generates `count` flashes with distinct titles and links.
 */
export function getMockFlashes(count: number): Flash[] {
    const topics = ['ETF flows', 'stablecoin supply', 'miner reserves', 'options expiry'];
    return Array.from({ length: count }, (_, index) =>
        getMockFlash({
            link: `https://news.example/flash/${index}`,
            title: `Flash ${index}: ${topics[index % topics.length]} update`,
            total: 60 + index,
        }),
    );
}
