import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = 'memory/logs';
const REDACTED = '[REDACTED]';
const MIN_ENV_VALUE_LENGTH = 6;

const SENSITIVE_ENV_NAME_PATTERN = /(api[_-]?key|token|secret|password)/i;
const SENSITIVE_PAIR_PATTERN =
    /((?:api[_-]?key|token|secret|password|authorization)["']?\s*[:=]\s*["']?)([^\s"',;]+)/gi;

let configuredLogDir: string | null = null;

/** Pin the log directory (from config). An empty value restores the env/default lookup. */
export function setLogDirectory(dir: string): void {
    configuredLogDir = dir.trim() ? path.resolve(dir) : null;
}

function resolveLogDir(): string {
    return configuredLogDir ?? path.resolve(process.env.STEPLOCK_LOG_DIR || DEFAULT_LOG_DIR);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_ENV_VALUE_LENGTH) continue;
        if (SENSITIVE_ENV_NAME_PATTERN.test(name)) {
            values.push(value);
        }
    }
    // Longest first so a value containing another is replaced whole.
    return values.sort((left, right) => right.length - left.length);
}

/**
 * Redact credentials from free text before it reaches a log line or an API
 * response. Handles `key=value` / `"key": "value"` pairs and raw values of
 * sensitive environment variables appearing anywhere in the text.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text.replace(SENSITIVE_PAIR_PATTERN, (_match, prefix: string) => `${prefix}${REDACTED}`);
    for (const value of sensitiveEnvValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
    }
    return scrubbed;
}

/**
 * Append a line to today's runtime log. Never rejects: callers fire and forget
 * with `void logThought(...)`.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const logDir = resolveLogDir();
    const file = path.join(logDir, `${now.toISOString().slice(0, 10)}.log`);
    const line = `[${now.toISOString()}] ${scrubSensitiveText(message)}\n`;

    try {
        await mkdir(logDir, { recursive: true });
        await appendFile(file, line, 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write log entry to ${file}: ${reason}`);
    }
}
