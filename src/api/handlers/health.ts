import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { ApprovalQueue } from '../../services/approval/approval-queue.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    queue: ApprovalQueue;
}

/** GET /health - Liveness plus a queue summary. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const open = !deps.queue.closed;
        const data: HealthData = {
            status: open ? 'ok' : 'degraded',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            queue: {
                open,
                pending: open ? deps.queue.listPending().length : 0,
            },
        };
        sendOk(res, data);
    };
}
