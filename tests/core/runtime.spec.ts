import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { mergeWithDefaults } from '../../src/config/json-config.js';
import { createRuntime, type Runtime } from '../../src/core/runtime.js';
import request from 'supertest';
import { QueueClosedError } from '../../src/types/approval.js';
import { StepLimitExceededError } from '../../src/types/workflow.js';
import { WorkflowGraph, action } from '../../src/workflow/graph.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
    scrubSensitiveText: (s: string) => s,
    setLogDirectory: vi.fn(),
}));

describe('createRuntime', () => {
    let dir: string;
    let runtime: Runtime;

    beforeEach(() => {
        dir = mkdtempSync(path.join(os.tmpdir(), 'steplock-runtime-'));
        runtime = createRuntime(mergeWithDefaults({
            runtime: { apiSecret: 'test-secret' },
            approval: { storePath: path.join(dir, 'approvals'), pollIntervalMs: 5, defaultTtlMs: 1_000 },
            workflow: { maxSteps: 3, timeoutMs: 5_000 },
        }));
    });

    afterEach(async () => {
        await runtime.close();
        rmSync(dir, { recursive: true, force: true });
    });

    it('opens the approval store from config', () => {
        const { record } = runtime.queue.request('sess-1', 'deploy');
        expect(runtime.queue.approve(record.id, 'alice').whitelistExpiresAt).not.toBeNull();
        expect(runtime.approval.keys.requests).toBe('workflow.approval.requests');
    });

    it('applies the configured step cap and run timeout', async () => {
        const graph = new WorkflowGraph().addNode(action('spin', () => undefined)).addTransition('spin', 'spin');
        const ctx = runtime.context({ 'workflow.session.id': 'sess-1' });

        expect(ctx.remainingMs()).toBeGreaterThan(4_000);
        await expect(runtime.executor(graph).run(ctx)).rejects.toBeInstanceOf(StepLimitExceededError);
        ctx.dispose();
    });

    it('serves the control plane and closes everything on shutdown', async () => {
        const server = await runtime.startApi(0);
        expect(await runtime.startApi(0)).toBe(server);

        const res = await request(server).get('/health');
        expect(res.status).toBe(200);

        await runtime.close();
        expect(server.listening).toBe(false);
        expect(() => runtime.queue.listPending()).toThrow(QueueClosedError);
    });
});
