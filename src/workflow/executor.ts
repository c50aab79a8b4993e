import { MiddlewarePipeline } from '../middleware/pipeline.js';
import { ApprovalDeniedError, ApprovalTimeoutError } from '../types/approval.js';
import {
    DeadlineExceededError,
    GraphValidationError,
    ParallelBranchError,
    StepLimitExceededError,
    WorkflowCancelledError,
    toError,
    type ExecutionResult,
    type ParallelNode,
    type Step,
    type WorkflowMiddleware,
    type WorkflowNode,
} from '../types/workflow.js';
import { logThought } from '../utils/logger.js';
import type { ExecutionContext } from './execution-context.js';
import type { WorkflowGraph } from './graph.js';

export interface ExecutorOptions {
    middleware?: WorkflowMiddleware[] | MiddlewarePipeline;
    /** Upper bound on node visits per run, branches included. 0 disables. */
    maxSteps?: number;
}

function passesThrough(error: Error): boolean {
    return error instanceof DeadlineExceededError
        || error instanceof WorkflowCancelledError
        || error instanceof ApprovalTimeoutError
        || error instanceof ApprovalDeniedError;
}

interface RunState {
    visited: string[];
    steps: number;
}

/**
 * Walks a {@link WorkflowGraph} over one {@link ExecutionContext}.
 *
 * Per node: middleware before-hooks, body, after-hooks, then the first
 * outgoing transition whose condition holds. A node without a matching
 * transition ends the walk.
 */
export class Executor {
    readonly #graph: WorkflowGraph;
    readonly #pipeline: MiddlewarePipeline;
    readonly #maxSteps: number;

    constructor(graph: WorkflowGraph, options: ExecutorOptions = {}) {
        this.#graph = graph;
        this.#pipeline = options.middleware instanceof MiddlewarePipeline
            ? options.middleware
            : new MiddlewarePipeline(options.middleware ?? []);
        this.#maxSteps = Math.max(0, Math.floor(options.maxSteps ?? 0));
    }

    /**
     * Run the graph once. The context serves this run only: its deadline timer
     * and parent signal listener are released when the run settles.
     */
    async run(ctx: ExecutionContext): Promise<ExecutionResult> {
        try {
            return await this.#run(ctx);
        } finally {
            ctx.dispose();
        }
    }

    async #run(ctx: ExecutionContext): Promise<ExecutionResult> {
        this.#graph.validate();
        const start = this.#graph.start;
        if (!start) {
            throw new GraphValidationError('[Executor] Graph has no start node.');
        }

        const state: RunState = { visited: [], steps: 0 };
        const startedAt = Date.now();
        void logThought(`[Executor] Run started at '${start}'.`);

        try {
            await this.#walk(ctx, start, state, null);
        } catch (error) {
            const failure = toError(error);
            void logThought(
                `[Executor] Run failed after ${state.steps} step(s) in ${Date.now() - startedAt}ms: ${failure.message}`,
            );
            throw failure;
        }

        void logThought(`[Executor] Run completed: ${state.steps} step(s) in ${Date.now() - startedAt}ms.`);
        return { visited: state.visited, steps: state.steps };
    }

    /** Visit nodes from `origin` until none matches or the next one is `stopAt`. */
    async #walk(
        ctx: ExecutionContext,
        origin: string,
        state: RunState,
        stopAt: string | null,
        branch?: string,
    ): Promise<void> {
        let current: string | null = origin;
        while (current !== null) {
            const node = this.#graph.node(current);
            if (!node) {
                throw new GraphValidationError(`[Executor] Node '${current}' disappeared from the graph.`);
            }

            const next = await this.#visit(ctx, node, state, branch);
            current = next === stopAt ? null : next;
        }
    }

    async #visit(
        ctx: ExecutionContext,
        node: WorkflowNode,
        state: RunState,
        branch?: string,
    ): Promise<string | null> {
        ctx.throwIfCancelled();

        state.steps += 1;
        if (this.#maxSteps > 0 && state.steps > this.#maxSteps) {
            throw new StepLimitExceededError(this.#maxSteps);
        }
        state.visited.push(node.name);

        const step: Step = branch === undefined
            ? { name: node.name, kind: node.kind }
            : { name: node.name, kind: node.kind, branch };

        if (node.kind === 'action') {
            await this.#pipeline.around(ctx, step, async () => {
                await node.run(ctx);
            });
            return this.#nextNode(ctx, node.name);
        }

        const join = this.#graph.resolveJoin(node);
        await this.#pipeline.around(ctx, step, () => this.#fanOut(ctx, node, join, state));
        return join ?? this.#nextNode(ctx, node.name);
    }

    /**
     * Run every branch concurrently and wait for all of them. The first branch
     * failure cancels the context so waits in sibling branches return early.
     * Run-level errors (deadline, cancellation, approval outcomes) surface as
     * themselves; anything else is wrapped with the failing branch.
     */
    async #fanOut(
        ctx: ExecutionContext,
        node: ParallelNode,
        join: string | null,
        state: RunState,
    ): Promise<void> {
        const failures: Array<{ branch: string; error: Error }> = [];

        await Promise.all(
            node.branches.map(async (branch) => {
                try {
                    await this.#walk(ctx, branch, state, join, branch);
                } catch (error) {
                    const failure = toError(error);
                    if (failures.length === 0) {
                        ctx.cancel(failure);
                    }
                    failures.push({ branch, error: failure });
                }
            }),
        );

        if (failures.length === 0) return;

        const failed = failures[0];
        if (passesThrough(failed.error)) {
            throw failed.error;
        }
        throw new ParallelBranchError(node.name, failed.branch, failed.error);
    }

    async #nextNode(ctx: ExecutionContext, from: string): Promise<string | null> {
        for (const transition of this.#graph.outgoing(from)) {
            if (await transition.condition(ctx)) {
                return transition.to;
            }
        }
        return null;
    }
}
