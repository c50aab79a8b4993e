import type { Request, Response } from 'express';
import type { ApprovalQueue } from '../../services/approval/approval-queue.js';
import type {
    ApprovalListData,
    ApprovalListQuery,
    ApproveRequestBody,
    DenyRequestBody,
    WhitelistStatusData,
} from '../../types/api.js';
import { ApprovalValidationError, type ApprovalDecision } from '../../types/approval.js';
import { isNonEmptyString, isRecord } from '../../utils/guards.js';
import { logThought } from '../../utils/logger.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface ApprovalDeps {
    queue: ApprovalQueue;
}

const DECISIONS: readonly ApprovalDecision[] = ['pending', 'approved', 'denied'];

function optionalQueryString(req: Request, name: string): string | undefined {
    const value = req.query[name];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ApprovalValidationError(`Query parameter '${name}' must be a single string.`);
    }
    return value.trim() || undefined;
}

function parseListQuery(req: Request): ApprovalListQuery {
    const sessionId = optionalQueryString(req, 'sessionId');
    const rawDecision = optionalQueryString(req, 'decision');
    if (rawDecision === undefined) {
        return { sessionId };
    }
    const decision = DECISIONS.find((candidate) => candidate === rawDecision);
    if (!decision) {
        throw new ApprovalValidationError(`Unknown decision '${rawDecision}'. Expected one of: ${DECISIONS.join(', ')}.`);
    }
    return { sessionId, decision };
}

function parseApproveBody(body: unknown): ApproveRequestBody {
    if (!isRecord(body)) {
        throw new ApprovalValidationError('Request body must be a JSON object.');
    }
    const { approver, ttlMs, comment } = body;
    if (!isNonEmptyString(approver)) {
        throw new ApprovalValidationError('approver is required.');
    }
    if (ttlMs !== undefined && (typeof ttlMs !== 'number' || !Number.isFinite(ttlMs) || ttlMs < 0)) {
        throw new ApprovalValidationError('ttlMs must be a non-negative number.');
    }
    if (comment !== undefined && typeof comment !== 'string') {
        throw new ApprovalValidationError('comment must be a string.');
    }
    return { approver, ttlMs, comment };
}

function parseDenyBody(body: unknown): DenyRequestBody {
    if (!isRecord(body)) {
        throw new ApprovalValidationError('Request body must be a JSON object.');
    }
    const { approver, reason } = body;
    if (!isNonEmptyString(approver)) {
        throw new ApprovalValidationError('approver is required.');
    }
    if (reason !== undefined && typeof reason !== 'string') {
        throw new ApprovalValidationError('reason must be a string.');
    }
    return { approver, reason };
}

function fail(res: Response, error: unknown): void {
    const { status, message } = mapError(error);
    sendError(res, message, status);
}

/** GET /approvals - Records filtered by session and decision. */
export function handleApprovalList(deps: ApprovalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const records = deps.queue.list(parseListQuery(req));
            const data: ApprovalListData = { records, total: records.length };
            sendOk(res, data);
        } catch (error) {
            fail(res, error);
        }
    };
}

/** GET /approvals/pending - Records still awaiting a decision. */
export function handleApprovalPending(deps: ApprovalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const records = deps.queue.listPending(optionalQueryString(req, 'sessionId'));
            const data: ApprovalListData = { records, total: records.length };
            sendOk(res, data);
        } catch (error) {
            fail(res, error);
        }
    };
}

/** GET /approvals/:id */
export function handleApprovalGet(deps: ApprovalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const record = deps.queue.get(req.params.id);
            if (!record) {
                sendError(res, `Approval record '${req.params.id}' not found.`, 404);
                return;
            }
            sendOk(res, record);
        } catch (error) {
            fail(res, error);
        }
    };
}

/** POST /approvals/:id/approve - Signed. */
export function handleApprovalApprove(deps: ApprovalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const body = parseApproveBody(req.body);
            const record = deps.queue.approve(req.params.id, body.approver, body.ttlMs, body.comment);
            void logThought(`[API] Approval ${record.id} approved by ${record.approver ?? body.approver}.`);
            sendOk(res, record);
        } catch (error) {
            fail(res, error);
        }
    };
}

/** POST /approvals/:id/deny - Signed. */
export function handleApprovalDeny(deps: ApprovalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const body = parseDenyBody(req.body);
            const record = deps.queue.deny(req.params.id, body.approver, body.reason);
            void logThought(`[API] Approval ${record.id} denied by ${record.approver ?? body.approver}.`);
            sendOk(res, record);
        } catch (error) {
            fail(res, error);
        }
    };
}

/** GET /whitelist/:sessionId?tool= */
export function handleWhitelistStatus(deps: ApprovalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const tool = optionalQueryString(req, 'tool');
            const data: WhitelistStatusData = {
                sessionId: req.params.sessionId,
                tool: tool ?? null,
                whitelisted: deps.queue.isWhitelisted(req.params.sessionId, tool),
            };
            sendOk(res, data);
        } catch (error) {
            fail(res, error);
        }
    };
}
