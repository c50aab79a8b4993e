export type ApprovalDecision = 'pending' | 'approved' | 'denied';

/**
 * How whitelist entries are keyed: per session, or per session and tool.
 */
export type WhitelistScope = 'session' | 'session-tool';

/** Submitted by a node body or caller before a guarded step. */
export interface ApprovalRequest {
    /** Falls back to the run's session id when omitted. */
    sessionId?: string;
    tool: string;
    params?: Record<string, unknown>;
    /** Requester's justification, kept for audit. */
    reason?: string;
}

export interface ApprovalRecord {
    id: string;
    sessionId: string;
    tool: string;
    params: Record<string, unknown>;
    /** Normalised filesystem paths found in params. Audit only. */
    paths: string[];
    decision: ApprovalDecision;
    requestedAt: string;
    approvedAt: string | null;
    deniedAt: string | null;
    approver: string | null;
    /** Decision note: approver comment, denial reason or auto-approval detail. */
    comment: string | null;
    reason: string | null;
    auto: boolean;
    /** Set when an approval granted a whitelist TTL. */
    whitelistExpiresAt: string | null;
}

export interface ApprovalRequestResult {
    record: ApprovalRecord;
    autoApproved: boolean;
}

export interface ApprovalFilter {
    sessionId?: string;
    tool?: string;
    decision?: ApprovalDecision;
}

export class ApprovalValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ApprovalValidationError';
    }
}

export class ApprovalNotFoundError extends Error {
    readonly id: string;

    constructor(id: string) {
        super(`Approval record '${id}' not found.`);
        this.name = 'ApprovalNotFoundError';
        this.id = id;
    }
}

export class ApprovalConflictError extends Error {
    readonly id: string;
    readonly decision: ApprovalDecision;

    constructor(id: string, decision: ApprovalDecision) {
        super(`Approval record '${id}' already decided (${decision}).`);
        this.name = 'ApprovalConflictError';
        this.id = id;
        this.decision = decision;
    }
}

export class ApprovalDeniedError extends Error {
    readonly record: ApprovalRecord;

    constructor(record: ApprovalRecord) {
        const detail = record.comment ? `: ${record.comment}` : '';
        super(`Approval denied for tool '${record.tool}' (record ${record.id})${detail}`);
        this.name = 'ApprovalDeniedError';
        this.record = record;
    }
}

export type ApprovalTimeoutKind = 'deadline' | 'cancelled';

/**
 * The wait ended before a decision. The record stays pending and can still be
 * resolved out-of-band.
 */
export class ApprovalTimeoutError extends Error {
    readonly kind: ApprovalTimeoutKind;
    readonly recordId: string;

    constructor(recordId: string, kind: ApprovalTimeoutKind, cause?: unknown) {
        const reason = kind === 'deadline' ? 'deadline exceeded' : 'run cancelled';
        super(`Approval wait for record ${recordId} ended: ${reason}.`, { cause });
        this.name = 'ApprovalTimeoutError';
        this.kind = kind;
        this.recordId = recordId;
    }
}

export class RecordLogError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'RecordLogError';
    }
}

export class QueueClosedError extends Error {
    constructor() {
        super('Approval queue is closed.');
        this.name = 'QueueClosedError';
    }
}
