import { randomUUID } from 'node:crypto';
import {
    ApprovalConflictError,
    ApprovalNotFoundError,
    ApprovalValidationError,
    QueueClosedError,
    type ApprovalFilter,
    type ApprovalRecord,
    type ApprovalRequestResult,
    type WhitelistScope,
} from '../../types/approval.js';
import { isRecord } from '../../utils/guards.js';
import { logThought } from '../../utils/logger.js';
import { extractPaths } from './paths.js';
import { RecordLog } from './record-log.js';
import { Whitelist, whitelistKey } from './whitelist.js';

/** Largest timestamp a Date can hold. */
const MAX_DATE_MS = 8.64e15;

export interface ApprovalQueueOptions {
    whitelist?: Whitelist;
    /** @default 'session' */
    whitelistScope?: WhitelistScope;
    /** TTL used by {@link ApprovalQueue.approve} when none is passed. @default 0 */
    defaultTtlMs?: number;
    now?: () => Date;
    generateId?: () => string;
}

function cloneRecord(record: ApprovalRecord): ApprovalRecord {
    return structuredClone(record);
}

/** Copy params through JSON so the stored value matches what the log holds. */
function snapshotParams(params: Record<string, unknown>): Record<string, unknown> {
    let copy: unknown;
    try {
        copy = JSON.parse(JSON.stringify(params));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ApprovalValidationError(`[ApprovalQueue] Params must be JSON-serialisable: ${message}`);
    }
    if (!isRecord(copy)) {
        throw new ApprovalValidationError('[ApprovalQueue] Params must be an object.');
    }
    return copy;
}

/**
 * Approval record lifecycle on top of a {@link RecordLog} and a
 * {@link Whitelist}.
 *
 * pending --approve--> approved (terminal)
 * pending --deny-----> denied (terminal)
 *
 * Every change is written to the log before memory is touched, so a failed
 * write leaves the queue as it was. Operations are synchronous and therefore
 * never interleave.
 */
export class ApprovalQueue {
    readonly #log: RecordLog;
    readonly #whitelist: Whitelist;
    readonly #scope: WhitelistScope;
    readonly #defaultTtlMs: number;
    readonly #now: () => Date;
    readonly #generateId: () => string;
    readonly #records: Map<string, ApprovalRecord> = new Map();
    #closed = false;

    /** Open (or create) the log at `location` and restore from it. */
    static open(location: string, options: ApprovalQueueOptions = {}): ApprovalQueue {
        return new ApprovalQueue(new RecordLog(location), options);
    }

    constructor(log: RecordLog, options: ApprovalQueueOptions = {}) {
        this.#log = log;
        this.#whitelist = options.whitelist ?? new Whitelist();
        this.#scope = options.whitelistScope ?? 'session';
        this.#defaultTtlMs = Math.max(0, options.defaultTtlMs ?? 0);
        this.#now = options.now ?? (() => new Date());
        this.#generateId = options.generateId ?? randomUUID;
        this.#restore();
    }

    get scope(): WhitelistScope {
        return this.#scope;
    }

    get closed(): boolean {
        return this.#closed;
    }

    request(
        sessionId: string,
        tool: string,
        params: Record<string, unknown> = {},
        reason?: string,
    ): ApprovalRequestResult {
        this.#assertOpen();
        const normalizedSession = sessionId.trim();
        const normalizedTool = tool.trim();
        if (!normalizedSession) {
            throw new ApprovalValidationError('[ApprovalQueue] session id is required.');
        }
        if (!normalizedTool) {
            throw new ApprovalValidationError('[ApprovalQueue] tool (command) is required.');
        }

        const storedParams = snapshotParams(params);
        const now = this.#now();
        const key = whitelistKey(this.#scope, normalizedSession, normalizedTool);
        const autoApproved = this.#whitelist.covers(key, now);
        const nowIso = now.toISOString();

        const record: ApprovalRecord = {
            id: this.#generateId(),
            sessionId: normalizedSession,
            tool: normalizedTool,
            params: storedParams,
            paths: extractPaths(storedParams),
            decision: autoApproved ? 'approved' : 'pending',
            requestedAt: nowIso,
            approvedAt: autoApproved ? nowIso : null,
            deniedAt: null,
            approver: null,
            comment: autoApproved ? this.#autoApprovalComment(key) : null,
            reason: reason?.trim() || null,
            auto: autoApproved,
            whitelistExpiresAt: null,
        };

        this.#log.append(record);
        this.#records.set(record.id, record);

        void logThought(
            autoApproved
                ? `[ApprovalQueue] Auto-approved ${record.tool} for session '${record.sessionId}' (${record.id}).`
                : `[ApprovalQueue] Queued ${record.tool} for session '${record.sessionId}' (${record.id}).`,
        );
        return { record: cloneRecord(record), autoApproved };
    }

    /**
     * Approve a pending record. A positive `ttlMs` whitelists the record's
     * scope until now + ttlMs.
     */
    approve(id: string, approver: string, ttlMs: number = this.#defaultTtlMs, comment?: string): ApprovalRecord {
        this.#assertOpen();
        const normalizedApprover = this.#requireApprover(approver);
        if (!Number.isFinite(ttlMs) || ttlMs < 0) {
            throw new ApprovalValidationError('[ApprovalQueue] ttlMs must be a non-negative number.');
        }
        const current = this.#requirePending(id);

        const now = this.#now();
        if (now.getTime() + ttlMs > MAX_DATE_MS) {
            throw new ApprovalValidationError('[ApprovalQueue] ttlMs reaches past the latest representable date.');
        }
        const expiresAt = ttlMs > 0 ? new Date(now.getTime() + ttlMs) : null;
        const updated: ApprovalRecord = {
            ...current,
            decision: 'approved',
            approvedAt: now.toISOString(),
            approver: normalizedApprover,
            comment: comment?.trim() || null,
            whitelistExpiresAt: expiresAt ? expiresAt.toISOString() : null,
        };

        this.#log.update(updated);
        this.#records.set(id, updated);
        if (expiresAt) {
            this.#whitelist.grant(whitelistKey(this.#scope, updated.sessionId, updated.tool), expiresAt);
        }

        void logThought(
            `[ApprovalQueue] ${normalizedApprover} approved ${updated.tool} (${id})` +
                (expiresAt ? `; whitelisted until ${expiresAt.toISOString()}.` : '.'),
        );
        return cloneRecord(updated);
    }

    deny(id: string, approver: string, reason?: string): ApprovalRecord {
        this.#assertOpen();
        const normalizedApprover = this.#requireApprover(approver);
        const current = this.#requirePending(id);

        const updated: ApprovalRecord = {
            ...current,
            decision: 'denied',
            deniedAt: this.#now().toISOString(),
            approver: normalizedApprover,
            comment: reason?.trim() || null,
        };

        this.#log.update(updated);
        this.#records.set(id, updated);

        void logThought(`[ApprovalQueue] ${normalizedApprover} denied ${updated.tool} (${id}).`);
        return cloneRecord(updated);
    }

    get(id: string): ApprovalRecord | undefined {
        this.#assertOpen();
        const record = this.#records.get(id);
        return record ? cloneRecord(record) : undefined;
    }

    list(filter: ApprovalFilter = {}): ApprovalRecord[] {
        this.#assertOpen();
        const matches: ApprovalRecord[] = [];
        for (const record of this.#records.values()) {
            if (filter.sessionId !== undefined && record.sessionId !== filter.sessionId) continue;
            if (filter.tool !== undefined && record.tool !== filter.tool) continue;
            if (filter.decision !== undefined && record.decision !== filter.decision) continue;
            matches.push(cloneRecord(record));
        }
        return matches;
    }

    listPending(sessionId?: string): ApprovalRecord[] {
        return this.list({ sessionId: sessionId?.trim(), decision: 'pending' });
    }

    /**
     * Whether requests in this scope would auto-approve now. Under the
     * session-tool scope with no tool given, any covered tool counts.
     */
    isWhitelisted(sessionId: string, tool?: string): boolean {
        this.#assertOpen();
        const now = this.#now();
        const normalizedSession = sessionId.trim();
        if (this.#scope === 'session-tool' && tool === undefined) {
            return this.#whitelist.coversSession(normalizedSession, now);
        }
        return this.#whitelist.covers(whitelistKey(this.#scope, normalizedSession, (tool ?? '').trim()), now);
    }

    close(): void {
        if (this.#closed) return;
        this.#closed = true;
        this.#log.close();
        void logThought(`[ApprovalQueue] Closed record log ${this.#log.file}.`);
    }

    #restore(): void {
        const now = this.#now();
        let pending = 0;
        for (const record of this.#log.load()) {
            this.#records.set(record.id, record);
            if (record.decision === 'pending') pending += 1;

            if (record.decision !== 'approved' || !record.whitelistExpiresAt) continue;
            const expiresAt = new Date(record.whitelistExpiresAt);
            if (Number.isNaN(expiresAt.getTime()) || expiresAt.getTime() <= now.getTime()) continue;
            this.#whitelist.grant(whitelistKey(this.#scope, record.sessionId, record.tool), expiresAt);
        }

        if (this.#records.size > 0) {
            void logThought(
                `[ApprovalQueue] Restored ${this.#records.size} record(s) (${pending} pending) from ${this.#log.file}.`,
            );
        }
    }

    #requirePending(id: string): ApprovalRecord {
        const record = this.#records.get(id);
        if (!record) {
            throw new ApprovalNotFoundError(id);
        }
        if (record.decision !== 'pending') {
            throw new ApprovalConflictError(id, record.decision);
        }
        return record;
    }

    #requireApprover(approver: string): string {
        const normalized = approver.trim();
        if (!normalized) {
            throw new ApprovalValidationError('[ApprovalQueue] approver is required.');
        }
        return normalized;
    }

    #autoApprovalComment(key: string): string {
        const expiry = this.#whitelist.expiryOf(key);
        const until = expiry ? ` until ${expiry.toISOString()}` : '';
        return `auto-approved: ${this.#scope === 'session' ? 'session' : 'session and tool'} whitelisted${until}`;
    }

    #assertOpen(): void {
        if (this.#closed) {
            throw new QueueClosedError();
        }
    }
}
