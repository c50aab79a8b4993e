import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ApprovalMiddleware, DEFAULT_APPROVAL_KEYS } from '../../src/middleware/approval-middleware.js';
import { ApprovalQueue } from '../../src/services/approval/approval-queue.js';
import {
    ApprovalDeniedError,
    ApprovalTimeoutError,
    ApprovalValidationError,
    type ApprovalRecord,
} from '../../src/types/approval.js';
import type { Step } from '../../src/types/workflow.js';
import { ExecutionContext } from '../../src/workflow/execution-context.js';
import { Executor } from '../../src/workflow/executor.js';
import { WorkflowGraph, action, parallel } from '../../src/workflow/graph.js';

const step: Step = { name: 'deploy', kind: 'action' };

/** Branch `a` queues an approval for `a2`; branch `b` finishes on its own. */
function gatedFanOut(): WorkflowGraph {
    return new WorkflowGraph()
        .addNode(parallel('fan', ['a', 'b']))
        .addNode(action('a', (ctx) => ctx.set('workflow.approval.requests', { tool: 'deploy' })))
        .addNode(action('a2', (ctx) => ctx.set('a.shipped', true)))
        .addNode(action('b', async (ctx) => {
            await sleep(5);
            ctx.set('b.done', true);
        }))
        .addNode(action('join', (ctx) => ctx.set('joined', true)))
        .addTransition('a', 'a2')
        .addTransition('a2', 'join')
        .addTransition('b', 'join');
}

function isRecordList(value: unknown): value is ApprovalRecord[] {
    return Array.isArray(value);
}

describe('ApprovalMiddleware', () => {
    let dir: string;
    let queue: ApprovalQueue;
    const contexts: ExecutionContext[] = [];

    const context = (initial: Record<string, unknown>, timeoutMs?: number) => {
        const ctx = new ExecutionContext(initial, { timeoutMs });
        contexts.push(ctx);
        return ctx;
    };

    beforeEach(() => {
        dir = mkdtempSync(path.join(os.tmpdir(), 'steplock-gate-'));
        queue = ApprovalQueue.open(dir);
    });

    afterEach(() => {
        for (const ctx of contexts.splice(0)) ctx.dispose();
        queue.close();
        rmSync(dir, { recursive: true, force: true });
    });

    it('does nothing when no request is queued', async () => {
        const ctx = context({ 'workflow.session.id': 'sess-1' });

        await new ApprovalMiddleware(queue).beforeStep(ctx, step);

        expect(queue.list()).toEqual([]);
        expect(ctx.has(DEFAULT_APPROVAL_KEYS.results)).toBe(false);
    });

    it('blocks until an approver decides and then publishes the records', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const ctx = context({
            'workflow.session.id': 'sess-mw',
            'workflow.approval.requests': { tool: 'deploy', params: { env: 'dev' } },
        });

        const waiting = gate.beforeStep(ctx, step);
        const pending = queue.listPending('sess-mw');
        expect(pending).toHaveLength(1);
        expect(ctx.has('workflow.approval.requests')).toBe(false);

        queue.approve(pending[0].id, 'ok');
        await waiting;

        const results = ctx.get('workflow.approval.results');
        expect(isRecordList(results)).toBe(true);
        if (!isRecordList(results)) return;
        expect(results).toHaveLength(1);
        expect(results[0].decision).toBe('approved');
        expect(results[0].params).toEqual({ env: 'dev' });
    });

    it('fails the step when the request is denied', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const ctx = context({
            'workflow.approval.requests': [{ sessionId: 'sess-1', tool: 'fs.delete', params: { path: '/tmp/x' } }],
        });

        const waiting = gate.beforeStep(ctx, step);
        const [record] = queue.listPending('sess-1');
        queue.deny(record.id, 'bob', 'not today');

        await expect(waiting).rejects.toBeInstanceOf(ApprovalDeniedError);
        await expect(waiting).rejects.toThrow(`Approval denied for tool 'fs.delete' (record ${record.id}): not today`);
    });

    it('leaves the record pending when the run deadline ends the wait', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const ctx = context({
            'workflow.session.id': 'sess-1',
            'workflow.approval.requests': { tool: 'deploy' },
        }, 30);

        const failure = await gate.beforeStep(ctx, step).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(ApprovalTimeoutError);
        if (!(failure instanceof ApprovalTimeoutError)) return;
        expect(failure.kind).toBe('deadline');
        expect(queue.get(failure.recordId)?.decision).toBe('pending');
    });

    it('reports cancellation separately from the deadline', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const ctx = context({
            'workflow.session.id': 'sess-1',
            'workflow.approval.requests': { tool: 'deploy' },
        });

        const waiting = gate.beforeStep(ctx, step).catch((error: unknown) => error);
        ctx.cancel();
        const failure = await waiting;

        expect(failure).toBeInstanceOf(ApprovalTimeoutError);
        expect(failure instanceof ApprovalTimeoutError ? failure.kind : null).toBe('cancelled');
        expect(queue.listPending('sess-1')).toHaveLength(1);
    });

    it('passes whitelisted requests without waiting', async () => {
        const seed = queue.request('sess-1', 'deploy').record;
        queue.approve(seed.id, 'alice', 60_000);
        const gate = new ApprovalMiddleware(queue);
        const ctx = context({
            'workflow.session.id': 'sess-1',
            'workflow.approval.requests': { tool: 'deploy', params: { env: 'prod' } },
        });

        await gate.beforeStep(ctx, step);

        const results = ctx.get('workflow.approval.results');
        if (!isRecordList(results)) throw new Error('expected approval results');
        expect(results[0].auto).toBe(true);
        expect(results[0].comment).toContain('whitelisted');
    });

    it('uses configured context keys', async () => {
        const seed = queue.request('sess-int', 'deploy').record;
        queue.approve(seed.id, 'alice', 60_000);
        const gate = new ApprovalMiddleware(queue, {
            keys: { requests: 'int.requests', results: 'int.results', session: 'int.session' },
        });
        const ctx = context({ 'int.session': 'sess-int', 'int.requests': { tool: 'deploy' } });

        await gate.beforeStep(ctx, step);

        expect(gate.keys.requests).toBe('int.requests');
        expect(ctx.has('int.requests')).toBe(false);
        expect(isRecordList(ctx.get('int.results'))).toBe(true);
    });

    it('rejects malformed request values', async () => {
        const gate = new ApprovalMiddleware(queue);

        await expect(gate.beforeStep(context({ 'workflow.approval.requests': 42 }), step))
            .rejects.toBeInstanceOf(ApprovalValidationError);
        await expect(gate.beforeStep(context({ 'workflow.approval.requests': [{ tool: 'x', params: 'nope' }] }), step))
            .rejects.toThrow('[ApprovalMiddleware] Request #0 params must be an object.');
        await expect(gate.beforeStep(context({ 'workflow.approval.requests': { tool: 'deploy' } }), step))
            .rejects.toThrow(/session id/);
    });

    it('gates the next step of a running workflow', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const graph = new WorkflowGraph()
            .addNode(action('plan', (ctx) => ctx.set('workflow.approval.requests', { tool: 'deploy' })))
            .addNode(action('ship', (ctx) => ctx.set('shipped', true)))
            .addTransition('plan', 'ship');
        const ctx = context({ 'workflow.session.id': 'sess-run' });

        const run = new Executor(graph, { middleware: [gate] }).run(ctx);
        await vi.waitFor(() => {
            expect(queue.listPending('sess-run')).toHaveLength(1);
        });
        expect(ctx.has('shipped')).toBe(false);
        queue.approve(queue.listPending('sess-run')[0].id, 'alice');

        await expect(run).resolves.toEqual({ visited: ['plan', 'ship'], steps: 2 });
        expect(ctx.get('shipped')).toBe(true);
    });

    it('lets a sibling branch finish while another waits on approval', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const ctx = context({ 'workflow.session.id': 'sess-par' });

        const run = new Executor(gatedFanOut(), { middleware: [gate] }).run(ctx);
        await vi.waitFor(() => {
            expect(ctx.get('b.done')).toBe(true);
            expect(queue.listPending('sess-par')).toHaveLength(1);
        });
        expect(ctx.has('a.shipped')).toBe(false);
        queue.approve(queue.listPending('sess-par')[0].id, 'alice');

        const result = await run;
        expect(result.visited).toEqual(['fan', 'a', 'b', 'a2', 'join']);
        expect(ctx.get('a.shipped')).toBe(true);
        expect(ctx.get('joined')).toBe(true);
    });

    it('surfaces an approval timeout inside a branch as itself', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const ctx = context({ 'workflow.session.id': 'sess-par' }, 60);

        const failure = await new Executor(gatedFanOut(), { middleware: [gate] }).run(ctx)
            .catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(ApprovalTimeoutError);
        if (!(failure instanceof ApprovalTimeoutError)) return;
        expect(failure.kind).toBe('deadline');
        expect(queue.get(failure.recordId)?.decision).toBe('pending');
        expect(ctx.get('b.done')).toBe(true);
        expect(ctx.has('joined')).toBe(false);
    });

    it('surfaces a denial inside a branch as itself', async () => {
        const gate = new ApprovalMiddleware(queue, { pollIntervalMs: 5 });
        const ctx = context({ 'workflow.session.id': 'sess-par' });

        const run = new Executor(gatedFanOut(), { middleware: [gate] }).run(ctx)
            .catch((error: unknown) => error);
        await vi.waitFor(() => {
            expect(queue.listPending('sess-par')).toHaveLength(1);
        });
        const [record] = queue.listPending('sess-par');
        queue.deny(record.id, 'bob', 'not today');

        const failure = await run;
        expect(failure).toBeInstanceOf(ApprovalDeniedError);
        expect(failure instanceof Error ? failure.message : null)
            .toBe(`Approval denied for tool 'deploy' (record ${record.id}): not today`);
        expect(ctx.has('a.shipped')).toBe(false);
    });
});
