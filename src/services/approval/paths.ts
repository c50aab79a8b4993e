import os from 'node:os';
import path from 'node:path';
import { isRecord } from '../../utils/guards.js';

const PATH_KEY_WORDS = new Set([
    'path', 'paths', 'file', 'files', 'filename', 'dir', 'directory', 'cwd', 'target', 'dest', 'destination',
]);
const PATH_PREFIXES = ['/', './', '../', '~/'];
const MAX_DEPTH = 4;

/** Last word of a snake, kebab, dotted or camelCase key. */
function lastKeyWord(key: string): string {
    const words = key
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .toLowerCase()
        .split(/[_.\-\s]+/)
        .filter(Boolean);
    return words[words.length - 1] ?? '';
}

function looksLikePath(key: string | null, value: string): boolean {
    if (PATH_PREFIXES.some((prefix) => value.startsWith(prefix)) || value === '~') {
        return true;
    }
    return key !== null && PATH_KEY_WORDS.has(lastKeyWord(key));
}

/** Resolve to a clean absolute path, or null for unusable input. */
export function normalizePath(raw: string): string | null {
    const trimmed = raw.trim();
    if (!trimmed || trimmed.includes('\0')) {
        return null;
    }

    let expanded = trimmed;
    if (trimmed === '~') {
        expanded = os.homedir();
    } else if (trimmed.startsWith('~/')) {
        expanded = path.join(os.homedir(), trimmed.slice(2));
    }
    return path.resolve(expanded);
}

/**
 * Collect filesystem paths from approval params: string values under path-like
 * keys, and any string that starts like a path. Arrays and nested objects are
 * searched a few levels deep. Empty or malformed entries are skipped.
 */
export function extractPaths(params: Record<string, unknown>): string[] {
    const found = new Set<string>();

    const visit = (key: string | null, value: unknown, depth: number): void => {
        if (depth > MAX_DEPTH) return;

        if (typeof value === 'string') {
            if (!looksLikePath(key, value)) return;
            const normalized = normalizePath(value);
            if (normalized) found.add(normalized);
            return;
        }
        if (Array.isArray(value)) {
            for (const item of value) visit(key, item, depth + 1);
            return;
        }
        if (isRecord(value)) {
            for (const [childKey, child] of Object.entries(value)) visit(childKey, child, depth + 1);
        }
    };

    for (const [key, value] of Object.entries(params)) {
        visit(key, value, 0);
    }
    return [...found];
}
