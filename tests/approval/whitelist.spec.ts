import { describe, expect, it } from 'vitest';
import { Whitelist, whitelistKey } from '../../src/services/approval/whitelist.js';

const at = (iso: string) => new Date(iso);

describe('Whitelist', () => {
    it('covers a key until its expiry and not after', () => {
        const whitelist = new Whitelist();
        whitelist.grant('sess-1', at('2026-01-01T00:01:00.000Z'));

        expect(whitelist.covers('sess-1', at('2026-01-01T00:00:59.999Z'))).toBe(true);
        expect(whitelist.covers('sess-1', at('2026-01-01T00:01:00.000Z'))).toBe(false);
        expect(whitelist.covers('sess-2', at('2026-01-01T00:00:00.000Z'))).toBe(false);
    });

    it('never shortens an existing entry', () => {
        const whitelist = new Whitelist();
        whitelist.grant('sess-1', at('2026-01-01T01:00:00.000Z'));
        whitelist.grant('sess-1', at('2026-01-01T00:30:00.000Z'));

        expect(whitelist.expiryOf('sess-1')?.toISOString()).toBe('2026-01-01T01:00:00.000Z');
        expect(whitelist.size).toBe(1);
        expect(whitelist.expiryOf('sess-2')).toBeNull();
    });

    it('answers per session across session-tool keys', () => {
        const whitelist = new Whitelist();
        const now = at('2026-01-01T00:00:00.000Z');
        whitelist.grant(whitelistKey('session-tool', 'sess-1', 'fs.write'), at('2026-01-01T00:05:00.000Z'));

        expect(whitelistKey('session', 'sess-1', 'fs.write')).toBe('sess-1');
        expect(whitelist.coversSession('sess-1', now)).toBe(true);
        expect(whitelist.coversSession('sess-10', now)).toBe(false);
        expect(whitelist.covers(whitelistKey('session-tool', 'sess-1', 'shell'), now)).toBe(false);
    });
});
