import type { ApprovalDecision, ApprovalRecord } from './approval.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    queue: {
        open: boolean;
        pending: number;
    };
}

// ── Approvals ───────────────────────────────────────────────────────────────

export interface ApprovalListQuery {
    sessionId?: string;
    decision?: ApprovalDecision;
}

export interface ApproveRequestBody {
    approver: string;
    ttlMs?: number;
    comment?: string;
}

export interface DenyRequestBody {
    approver: string;
    reason?: string;
}

export interface ApprovalListData {
    records: ApprovalRecord[];
    total: number;
}

export interface WhitelistStatusData {
    sessionId: string;
    tool: string | null;
    whitelisted: boolean;
}
