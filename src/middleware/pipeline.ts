/**
 * MiddlewarePipeline: wraps every node visit in the registered middleware.
 *
 * - beforeStep runs in registration order, afterStep in reverse, so the last
 *   registered middleware sits innermost around the body.
 * - Only middleware whose beforeStep completed get an afterStep call. A failing
 *   beforeStep or body unwinds those with the error; the error then fails the
 *   step.
 */

import type { ExecutionContext } from '../workflow/execution-context.js';
import { toError, type Step, type WorkflowMiddleware } from '../types/workflow.js';
import { logThought } from '../utils/logger.js';

export class MiddlewarePipeline {
    readonly #middleware: WorkflowMiddleware[];

    constructor(middleware: WorkflowMiddleware[] = []) {
        this.#middleware = [...middleware];
    }

    use(middleware: WorkflowMiddleware): this {
        this.#middleware.push(middleware);
        return this;
    }

    get size(): number {
        return this.#middleware.length;
    }

    names(): string[] {
        return this.#middleware.map((m) => m.name);
    }

    async around(ctx: ExecutionContext, step: Step, body: () => Promise<void>): Promise<void> {
        const entered: WorkflowMiddleware[] = [];
        let failure: Error | null = null;

        for (const middleware of this.#middleware) {
            try {
                await middleware.beforeStep?.(ctx, step);
                entered.push(middleware);
            } catch (error) {
                failure = toError(error);
                break;
            }
        }

        if (!failure) {
            try {
                await body();
            } catch (error) {
                failure = toError(error);
            }
        }

        for (const middleware of entered.reverse()) {
            if (!middleware.afterStep) continue;
            try {
                await middleware.afterStep(ctx, step, failure);
            } catch (error) {
                const afterError = toError(error);
                if (!failure) {
                    failure = afterError;
                } else {
                    void logThought(
                        `[Pipeline] ${middleware.name}.afterStep failed while unwinding '${step.name}': ${afterError.message}`,
                    );
                }
            }
        }

        if (failure) {
            throw failure;
        }
    }
}
