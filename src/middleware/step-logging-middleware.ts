import type { Step, WorkflowMiddleware } from '../types/workflow.js';
import { logThought } from '../utils/logger.js';
import type { ExecutionContext } from '../workflow/execution-context.js';

function label(step: Step): string {
    return step.branch === undefined ? `'${step.name}'` : `'${step.name}' (branch ${step.branch})`;
}

/** Logs entry, exit and failure of every step with its duration. */
export class StepLoggingMiddleware implements WorkflowMiddleware {
    readonly name = 'step-logging';
    readonly #startedAt: Map<string, number[]> = new Map();
    readonly #now: () => number;

    constructor(options: { now?: () => number } = {}) {
        this.#now = options.now ?? Date.now;
    }

    beforeStep(_ctx: ExecutionContext, step: Step): void {
        const key = this.#key(step);
        const stack = this.#startedAt.get(key) ?? [];
        stack.push(this.#now());
        this.#startedAt.set(key, stack);
        void logThought(`[Step] Entering ${step.kind} ${label(step)}.`);
    }

    afterStep(_ctx: ExecutionContext, step: Step, error: Error | null): void {
        const key = this.#key(step);
        const stack = this.#startedAt.get(key);
        const startedAt = stack?.pop();
        if (stack && stack.length === 0) this.#startedAt.delete(key);
        const elapsed = startedAt === undefined ? '?' : String(this.#now() - startedAt);

        void logThought(
            error
                ? `[Step] ${label(step)} failed after ${elapsed}ms: ${error.message}`
                : `[Step] ${label(step)} completed in ${elapsed}ms.`,
        );
    }

    #key(step: Step): string {
        return `${step.branch ?? ''}\u0000${step.name}`;
    }
}
