import { describe, expect, test } from 'vitest';

import { TitleFingerprint } from '../../value-objects/flash/title-fingerprint.vo.js';
import { Flash } from '../flash.entity.js';

describe('Flash', () => {
    test('should map upstream keys to typed fields and keep the payload as given', () => {
        // Given
        const payload = {
            body: 'Outflows slowed after the rate decision.',
            custom_tag: 'macro',
            link: 'https://news.example/outflows',
            publish_time: '2024-03-08 14:05',
            score: { importance: 28, total: 77 },
            source: 'Example Wire',
            title: 'ETF outflows slow',
        };

        // When
        const flash = Flash.fromPayload(payload);

        // Then
        expect(flash.title).toBe('ETF outflows slow');
        expect(flash.body).toBe('Outflows slowed after the rate decision.');
        expect(flash.link).toBe('https://news.example/outflows');
        expect(flash.source).toBe('Example Wire');
        expect(flash.publishTime).toBe('2024-03-08 14:05');
        expect(flash.score.importance).toBe(28);
        expect(flash.score.total).toBe(77);
        expect(flash.polished).toBe(false);
        expect(flash.payload).toEqual(payload);
        expect(flash.payload).not.toBe(payload);
    });

    test('should default missing or null text fields to empty strings', () => {
        // When
        const flash = Flash.fromPayload({ link: null, title: 'Headline only' });

        // Then
        expect(flash.link).toBe('');
        expect(flash.body).toBe('');
        expect(flash.gptTitle).toBe('');
        expect(flash.score.total).toBe(0);
    });

    test('should reject a payload whose title is not a string', () => {
        // When / Then
        expect(() => Flash.fromPayload({ title: 42 })).toThrow('Invalid flash payload');
    });

    test('should fingerprint the normalized title', () => {
        // When
        const flash = Flash.fromPayload({ title: '  Solana Outage Resolved ' });

        // Then
        expect(flash.titleFingerprint.equals(TitleFingerprint.fromTitle('solana outage resolved'))).toBe(true);
    });
});
