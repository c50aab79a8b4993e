import type { WhitelistScope } from '../../types/approval.js';

const SCOPE_SEPARATOR = '\u0000';

/** Whitelist key for a session, or a session and tool. */
export function whitelistKey(scope: WhitelistScope, sessionId: string, tool: string): string {
    return scope === 'session' ? sessionId : `${sessionId}${SCOPE_SEPARATOR}${tool}`;
}

/**
 * In-memory map of scope key -> expiry. Expiry is checked lazily on lookup;
 * nothing sweeps stale entries.
 */
export class Whitelist {
    readonly #entries: Map<string, number> = new Map();

    /** Install or extend an entry. An earlier expiry never shortens a later one. */
    grant(key: string, expiresAt: Date): void {
        const next = expiresAt.getTime();
        const current = this.#entries.get(key);
        if (current === undefined || next > current) {
            this.#entries.set(key, next);
        }
    }

    covers(key: string, now: Date): boolean {
        const expiry = this.#entries.get(key);
        return expiry !== undefined && expiry > now.getTime();
    }

    /** True when any unexpired key starts with `sessionId` + separator. */
    coversSession(sessionId: string, now: Date): boolean {
        if (this.covers(sessionId, now)) return true;
        const prefix = `${sessionId}${SCOPE_SEPARATOR}`;
        for (const [key, expiry] of this.#entries) {
            if (key.startsWith(prefix) && expiry > now.getTime()) {
                return true;
            }
        }
        return false;
    }

    expiryOf(key: string): Date | null {
        const expiry = this.#entries.get(key);
        return expiry === undefined ? null : new Date(expiry);
    }

    get size(): number {
        return this.#entries.size;
    }
}
