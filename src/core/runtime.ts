import type { Server } from 'node:http';
import { startApiServer } from '../api/router.js';
import { resolveApiSecret, type SteplockConfig } from '../config/json-config.js';
import { ApprovalMiddleware } from '../middleware/approval-middleware.js';
import { ApprovalQueue } from '../services/approval/approval-queue.js';
import type { WorkflowMiddleware } from '../types/workflow.js';
import { logThought, setLogDirectory } from '../utils/logger.js';
import { ExecutionContext, type ExecutionContextOptions } from '../workflow/execution-context.js';
import { Executor } from '../workflow/executor.js';
import type { WorkflowGraph } from '../workflow/graph.js';

export interface Runtime {
    readonly config: SteplockConfig;
    readonly queue: ApprovalQueue;
    readonly approval: ApprovalMiddleware;
    /**
     * Executor for `graph` with the configured step cap. The approval
     * middleware is not added implicitly; include `runtime.approval` where the
     * graph needs gating.
     */
    executor(graph: WorkflowGraph, middleware?: WorkflowMiddleware[]): Executor;
    /** Context carrying the configured run timeout unless options override it. */
    context(initial?: Record<string, unknown>, options?: ExecutionContextOptions): ExecutionContext;
    startApi(port?: number): Promise<Server>;
    close(): Promise<void>;
}

/** Wire config, approval queue, middleware and control plane together. */
export function createRuntime(config: SteplockConfig): Runtime {
    setLogDirectory(config.runtime.logDir);

    const queue = ApprovalQueue.open(config.approval.storePath, {
        whitelistScope: config.approval.whitelistScope,
        defaultTtlMs: config.approval.defaultTtlMs,
    });
    const approval = new ApprovalMiddleware(queue, { pollIntervalMs: config.approval.pollIntervalMs });
    let server: Server | null = null;

    void logThought(`[Runtime] Approval store ready at ${config.approval.storePath}.`);

    return {
        config,
        queue,
        approval,

        executor(graph, middleware = []) {
            return new Executor(graph, { middleware, maxSteps: config.workflow.maxSteps });
        },

        context(initial = {}, options = {}) {
            return new ExecutionContext(initial, { timeoutMs: config.workflow.timeoutMs, ...options });
        },

        async startApi(port = config.runtime.apiPort) {
            if (server) return server;
            server = await startApiServer({ queue, apiSecret: () => resolveApiSecret(config) }, port);
            return server;
        },

        async close() {
            const running = server;
            server = null;
            if (running) {
                await new Promise<void>((resolve, reject) => {
                    running.close((error) => (error ? reject(error) : resolve()));
                });
            }
            queue.close();
            void logThought('[Runtime] Shut down.');
        },
    };
}
