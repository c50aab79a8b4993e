#!/usr/bin/env node
import { readConfig, resolveApiSecret } from './config/json-config.js';
import { createRuntime } from './core/runtime.js';
import { logThought } from './utils/logger.js';

async function main(): Promise<void> {
    const config = await readConfig();
    const runtime = createRuntime(config);

    if (!resolveApiSecret(config)) {
        console.warn('[Steplock] No API secret configured; approve/deny endpoints will answer 503.');
    }

    await runtime.startApi();
    console.log(`[Steplock] Approval control plane listening on port ${config.runtime.apiPort}.`);

    let shuttingDown = false;
    const shutdown = (signal: string): void => {
        if (shuttingDown) return;
        shuttingDown = true;
        void logThought(`[Steplock] Received ${signal}; shutting down.`);
        runtime.close().then(
            () => process.exit(0),
            (error: unknown) => {
                console.error('[Steplock] Shutdown failed:', error);
                process.exit(1);
            },
        );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    console.error('[Steplock] Fatal startup error:', error);
    process.exit(1);
});
