import { MiddlewareInputError, type ChatMessage, type Summarizer } from '../types/agent.js';
import type { Step, WorkflowMiddleware } from '../types/workflow.js';
import { isRecord, isStringArray } from '../utils/guards.js';
import { logThought } from '../utils/logger.js';
import type { ExecutionContext } from '../workflow/execution-context.js';

export interface SummaryContextKeys {
    messages: string;
    current: string;
    history: string;
}

export const DEFAULT_SUMMARY_KEYS: Readonly<SummaryContextKeys> = {
    messages: 'workflow.summary.messages',
    current: 'workflow.summary.current',
    history: 'workflow.summary.history',
};

export const DEFAULT_SUMMARY_MANUAL_KEY = 'workflow.summary.manual';

export interface SummarizationMiddlewareOptions {
    /** Summarise once this many messages have accumulated. 0 disables. @default 20 */
    threshold?: number;
    keys?: Partial<SummaryContextKeys>;
    /** Boolean flag that forces a summary on the next step. */
    manualKey?: string;
}

const DEFAULT_THRESHOLD = 20;

function readMessages(ctx: ExecutionContext, key: string): ChatMessage[] {
    const value = ctx.get(key);
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
        throw new MiddlewareInputError(key, 'expected an array of messages.');
    }
    return value.map((item, index) => {
        const role = isRecord(item) ? item.role : undefined;
        const content = isRecord(item) ? item.content : undefined;
        if (typeof role !== 'string' || typeof content !== 'string') {
            throw new MiddlewareInputError(key, `message #${index} needs string role and content.`);
        }
        return { role, content };
    });
}

/**
 * Compacts the running conversation before a step once it grows past the
 * threshold, or when the manual flag is set.
 */
export class SummarizationMiddleware implements WorkflowMiddleware {
    readonly name = 'summarization';
    readonly #summarizer: Summarizer;
    readonly #threshold: number;
    readonly #keys: SummaryContextKeys;
    readonly #manualKey: string;

    constructor(summarizer: Summarizer, options: SummarizationMiddlewareOptions = {}) {
        this.#summarizer = summarizer;
        this.#threshold = Math.max(0, options.threshold ?? DEFAULT_THRESHOLD);
        this.#keys = { ...DEFAULT_SUMMARY_KEYS, ...options.keys };
        this.#manualKey = options.manualKey ?? DEFAULT_SUMMARY_MANUAL_KEY;
    }

    async beforeStep(ctx: ExecutionContext, step: Step): Promise<void> {
        const manual = ctx.get(this.#manualKey) === true;
        const messages = readMessages(ctx, this.#keys.messages);
        const overThreshold = this.#threshold > 0 && messages.length >= this.#threshold;
        if (!manual && !overThreshold) return;

        if (messages.length > 0) {
            const summary = await this.#summarizer.summarize(messages, ctx.signal);
            await ctx.update(this.#keys.history, (current) => {
                const history = isStringArray(current) ? current : [];
                return [...history, summary];
            });
            ctx.set(this.#keys.current, summary);
            ctx.set(this.#keys.messages, []);
            void logThought(
                `[Summarization] Condensed ${messages.length} message(s) before '${step.name}'${manual ? ' (manual)' : ''}.`,
            );
        }

        if (manual) {
            ctx.set(this.#manualKey, false);
        }
    }
}
