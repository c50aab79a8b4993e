import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import type { WhitelistScope } from '../types/approval.js';
import { isRecord } from '../utils/guards.js';

export interface SteplockConfig {
    runtime: {
        apiPort: number;
        /** HMAC secret for signed API routes. `STEPLOCK_API_SECRET` wins when set. */
        apiSecret: string;
        /** Overrides `STEPLOCK_LOG_DIR` when non-empty. */
        logDir: string;
    };
    approval: {
        /** Directory holding `approvals.db`, or a `.db` file path. */
        storePath: string;
        pollIntervalMs: number;
        whitelistScope: WhitelistScope;
        defaultTtlMs: number;
    };
    workflow: {
        /** 0 disables the cap. */
        maxSteps: number;
        /** 0 disables the run deadline. */
        timeoutMs: number;
    };
}

export const DEFAULT_CONFIG: SteplockConfig = {
    runtime: {
        apiPort: 18790,
        apiSecret: '',
        logDir: '',
    },
    approval: {
        storePath: 'memory/approvals',
        pollIntervalMs: 250,
        whitelistScope: 'session',
        defaultTtlMs: 0,
    },
    workflow: {
        maxSteps: 0,
        timeoutMs: 0,
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.STEPLOCK_CONFIG_PATH) {
        return path.resolve(process.env.STEPLOCK_CONFIG_PATH);
    }
    return path.resolve('steplock.json');
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

function errorCode(error: unknown): string | undefined {
    if (!isRecord(error)) return undefined;
    return typeof error.code === 'string' ? error.code : undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export async function readConfig(overridePath?: string): Promise<SteplockConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${errorMessage(error)}`);
    }

    try {
        const parsed: unknown = JSON.parse(rawData);
        return mergeWithDefaults(parsed);
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${errorMessage(error)}`);
    }
}

export async function writeConfig(config: SteplockConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${errorMessage(error)}`);
    }
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = source[key];
    return isRecord(value) ? value : {};
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function pickCount(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? Math.floor(value) : fallback;
}

function pickPort(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = pickCount(source, key, fallback);
    return value > 0 && value < 65536 ? value : fallback;
}

function pickScope(source: Record<string, unknown>, key: string, fallback: WhitelistScope): WhitelistScope {
    const value = source[key];
    return value === 'session' || value === 'session-tool' ? value : fallback;
}

/** Overlay known, well-typed values from `loaded` onto the defaults. */
export function mergeWithDefaults(loaded: unknown): SteplockConfig {
    const root = isRecord(loaded) ? loaded : {};
    const runtime = section(root, 'runtime');
    const approval = section(root, 'approval');
    const workflow = section(root, 'workflow');
    const defaults = DEFAULT_CONFIG;

    return {
        runtime: {
            apiPort: pickPort(runtime, 'apiPort', defaults.runtime.apiPort),
            apiSecret: pickString(runtime, 'apiSecret', defaults.runtime.apiSecret),
            logDir: pickString(runtime, 'logDir', defaults.runtime.logDir),
        },
        approval: {
            storePath: pickString(approval, 'storePath', defaults.approval.storePath).trim()
                || defaults.approval.storePath,
            pollIntervalMs: pickCount(approval, 'pollIntervalMs', defaults.approval.pollIntervalMs)
                || defaults.approval.pollIntervalMs,
            whitelistScope: pickScope(approval, 'whitelistScope', defaults.approval.whitelistScope),
            defaultTtlMs: pickCount(approval, 'defaultTtlMs', defaults.approval.defaultTtlMs),
        },
        workflow: {
            maxSteps: pickCount(workflow, 'maxSteps', defaults.workflow.maxSteps),
            timeoutMs: pickCount(workflow, 'timeoutMs', defaults.workflow.timeoutMs),
        },
    };
}

/** Effective API secret: the environment override, then the config file. */
export function resolveApiSecret(config: SteplockConfig): string {
    const fromEnv = process.env.STEPLOCK_API_SECRET?.trim();
    return fromEnv || config.runtime.apiSecret;
}
