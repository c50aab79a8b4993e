import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import type { ApprovalQueue } from '../services/approval/approval-queue.js';
import { logThought } from '../utils/logger.js';
import { handleHealth } from './handlers/health.js';
import {
    handleApprovalApprove,
    handleApprovalDeny,
    handleApprovalGet,
    handleApprovalList,
    handleApprovalPending,
    handleWhitelistStatus,
} from './handlers/approvals.js';
import { requestLogger, requireSignature, sendError, setRawRequestBody } from './shared.js';

export interface ApiServerDeps {
    queue: ApprovalQueue;
    /** HMAC secret for mutating routes. Empty disables them (503). */
    apiSecret: string | (() => string);
}

export const DEFAULT_API_PORT = 18790;

/**
 * Build the approval control-plane app.
 *
 * Endpoints:
 *   GET  /health                  - Liveness and queue summary
 *   GET  /approvals               - Records (?sessionId=&decision=)
 *   GET  /approvals/pending       - Pending records (?sessionId=)
 *   GET  /approvals/:id           - One record
 *   GET  /whitelist/:sessionId    - Whitelist status (?tool=)
 *   POST /approvals/:id/approve   - Approve, optionally with a whitelist TTL (signed)
 *   POST /approvals/:id/deny      - Deny (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    const { apiSecret } = deps;
    const getSecret = typeof apiSecret === 'function' ? apiSecret : () => apiSecret;
    const signed = requireSignature(getSecret);
    const approvalDeps = { queue: deps.queue };

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth({ queue: deps.queue }));

    app.get('/approvals', handleApprovalList(approvalDeps));
    app.get('/approvals/pending', handleApprovalPending(approvalDeps));
    app.get('/approvals/:id', handleApprovalGet(approvalDeps));
    app.get('/whitelist/:sessionId', handleWhitelistStatus(approvalDeps));

    app.post('/approvals/:id/approve', signed, handleApprovalApprove(approvalDeps));
    app.post('/approvals/:id/deny', signed, handleApprovalDeny(approvalDeps));

    // ── Fallbacks ───────────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });
    app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        const message = err instanceof Error ? err.message : String(err);
        const status = err instanceof SyntaxError ? 400 : 500;
        void logThought(`[API] Unhandled request error: ${message}`);
        sendError(res, status === 400 ? `Malformed JSON body: ${message}` : message, status);
    });

    return app;
}

/** Create the app and start listening on `port`. */
export function startApiServer(deps: ApiServerDeps, port: number = DEFAULT_API_PORT): Promise<Server> {
    const server = createServer(createApiApp(deps));
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            void logThought(`[API] Control plane listening on port ${port}.`);
            resolve(server);
        });
    });
}
