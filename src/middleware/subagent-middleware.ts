import {
    MiddlewareInputError,
    type SubAgentDelegate,
    type SubAgentRequest,
    type SubAgentResult,
} from '../types/agent.js';
import type { Step, WorkflowMiddleware } from '../types/workflow.js';
import { isNonEmptyString, isRecord } from '../utils/guards.js';
import { logThought } from '../utils/logger.js';
import type { ExecutionContext } from '../workflow/execution-context.js';

export interface SubAgentContextKeys {
    requests: string;
    results: string;
}

export const DEFAULT_SUBAGENT_KEYS: Readonly<SubAgentContextKeys> = {
    requests: 'workflow.subagent.requests',
    results: 'workflow.subagent.results',
};

function parseRequests(key: string, value: unknown): SubAgentRequest[] {
    const items = Array.isArray(value) ? value : [value];
    return items.map((item, index) => {
        if (!isRecord(item)) {
            throw new MiddlewareInputError(key, `request #${index} is not an object.`);
        }
        const { instruction, metadata } = item;
        if (!isNonEmptyString(instruction)) {
            throw new MiddlewareInputError(key, `request #${index} needs a non-empty instruction.`);
        }
        if (metadata === undefined) {
            return { instruction };
        }
        if (!isRecord(metadata)) {
            throw new MiddlewareInputError(key, `request #${index} metadata must be an object.`);
        }
        return { instruction, metadata };
    });
}

/** Hands queued sub-agent requests to a delegate, one at a time, before the step. */
export class SubAgentMiddleware implements WorkflowMiddleware {
    readonly name = 'subagent';
    readonly #delegate: SubAgentDelegate;
    readonly #keys: SubAgentContextKeys;

    constructor(delegate: SubAgentDelegate, options: { keys?: Partial<SubAgentContextKeys> } = {}) {
        this.#delegate = delegate;
        this.#keys = { ...DEFAULT_SUBAGENT_KEYS, ...options.keys };
    }

    async beforeStep(ctx: ExecutionContext, step: Step): Promise<void> {
        if (!ctx.has(this.#keys.requests)) return;
        const requests = parseRequests(this.#keys.requests, ctx.get(this.#keys.requests));
        ctx.delete(this.#keys.requests);

        const results: SubAgentResult[] = [];
        for (const request of requests) {
            ctx.throwIfCancelled();
            results.push(await this.#delegate.delegate(request, ctx.signal));
        }

        ctx.set(this.#keys.results, results);
        void logThought(`[SubAgent] Delegated ${results.length} task(s) before '${step.name}'.`);
    }
}
