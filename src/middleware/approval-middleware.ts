import { setTimeout as sleep } from 'node:timers/promises';
import type { ApprovalQueue } from '../services/approval/approval-queue.js';
import {
    ApprovalDeniedError,
    ApprovalTimeoutError,
    ApprovalValidationError,
    type ApprovalRecord,
    type ApprovalRequest,
} from '../types/approval.js';
import { DeadlineExceededError, type Step, type WorkflowMiddleware } from '../types/workflow.js';
import { isNonEmptyString, isRecord } from '../utils/guards.js';
import { logThought } from '../utils/logger.js';
import type { ExecutionContext } from '../workflow/execution-context.js';

export interface ApprovalContextKeys {
    requests: string;
    results: string;
    session: string;
}

export const DEFAULT_APPROVAL_KEYS: Readonly<ApprovalContextKeys> = {
    requests: 'workflow.approval.requests',
    results: 'workflow.approval.results',
    session: 'workflow.session.id',
};

export interface ApprovalMiddlewareOptions {
    /** @default 250 */
    pollIntervalMs?: number;
    keys?: Partial<ApprovalContextKeys>;
}

const DEFAULT_POLL_INTERVAL_MS = 250;

function parseRequest(value: unknown, index: number): ApprovalRequest {
    if (!isRecord(value)) {
        throw new ApprovalValidationError(`[ApprovalMiddleware] Request #${index} is not an object.`);
    }
    const { sessionId, tool, params, reason } = value;
    if (!isNonEmptyString(tool)) {
        throw new ApprovalValidationError(`[ApprovalMiddleware] Request #${index} has no tool (command).`);
    }
    if (sessionId !== undefined && typeof sessionId !== 'string') {
        throw new ApprovalValidationError(`[ApprovalMiddleware] Request #${index} has a non-string sessionId.`);
    }
    if (params !== undefined && !isRecord(params)) {
        throw new ApprovalValidationError(`[ApprovalMiddleware] Request #${index} params must be an object.`);
    }
    if (reason !== undefined && typeof reason !== 'string') {
        throw new ApprovalValidationError(`[ApprovalMiddleware] Request #${index} has a non-string reason.`);
    }
    return { sessionId, tool, params, reason };
}

/** One request or a list of them; anything else is malformed. */
export function parseApprovalRequests(value: unknown): ApprovalRequest[] {
    if (Array.isArray(value)) {
        return value.map((item, index) => parseRequest(item, index));
    }
    return [parseRequest(value, 0)];
}

/**
 * Blocks a step until every approval request placed in the context has been
 * decided. Bodies (or earlier middleware) queue requests under `keys.requests`;
 * the approved records land under `keys.results`.
 *
 * A denial fails the step. Cancellation or the run deadline ends the wait and
 * leaves the record pending, so an approver can still decide it later.
 */
export class ApprovalMiddleware implements WorkflowMiddleware {
    readonly name = 'approval';
    readonly #queue: ApprovalQueue;
    readonly #pollIntervalMs: number;
    readonly #keys: ApprovalContextKeys;

    constructor(queue: ApprovalQueue, options: ApprovalMiddlewareOptions = {}) {
        this.#queue = queue;
        const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.#pollIntervalMs = interval > 0 ? interval : DEFAULT_POLL_INTERVAL_MS;
        this.#keys = { ...DEFAULT_APPROVAL_KEYS, ...options.keys };
    }

    get keys(): Readonly<ApprovalContextKeys> {
        return this.#keys;
    }

    async beforeStep(ctx: ExecutionContext, step: Step): Promise<void> {
        if (!ctx.has(this.#keys.requests)) return;

        const raw = ctx.get(this.#keys.requests);
        ctx.delete(this.#keys.requests);
        const requests = parseApprovalRequests(raw);
        if (requests.length === 0) return;

        const fallbackSession = ctx.getString(this.#keys.session) ?? '';
        const approved: ApprovalRecord[] = [];

        for (const request of requests) {
            ctx.throwIfCancelled();
            const { record, autoApproved } = this.#queue.request(
                request.sessionId ?? fallbackSession,
                request.tool,
                request.params,
                request.reason,
            );

            if (autoApproved) {
                approved.push(record);
                continue;
            }

            void logThought(`[ApprovalMiddleware] Step '${step.name}' waiting on approval ${record.id} (${record.tool}).`);
            approved.push(await this.#awaitDecision(ctx, record.id));
        }

        ctx.set(this.#keys.results, approved);
    }

    async #awaitDecision(ctx: ExecutionContext, id: string): Promise<ApprovalRecord> {
        for (;;) {
            const current = this.#queue.get(id);
            if (!current) {
                throw new ApprovalValidationError(`[ApprovalMiddleware] Approval record '${id}' vanished.`);
            }
            if (current.decision === 'approved') return current;
            if (current.decision === 'denied') {
                void logThought(`[ApprovalMiddleware] Approval ${id} denied by ${current.approver ?? 'unknown'}.`);
                throw new ApprovalDeniedError(current);
            }

            try {
                await sleep(this.#pollIntervalMs, undefined, { signal: ctx.signal });
            } catch (error) {
                if (!ctx.signal.aborted) throw error;
                const reason: unknown = ctx.signal.reason;
                const kind = reason instanceof DeadlineExceededError
                    || (reason instanceof Error && reason.name === 'TimeoutError')
                    ? 'deadline'
                    : 'cancelled';
                void logThought(`[ApprovalMiddleware] Wait for ${id} ended (${kind}); record left pending.`);
                throw new ApprovalTimeoutError(id, kind, reason);
            }
        }
    }
}
