import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RecordLog, resolveRecordLogFile } from '../../src/services/approval/record-log.js';
import { QueueClosedError, RecordLogError, type ApprovalRecord } from '../../src/types/approval.js';

function pendingRecord(id: string, overrides: Partial<ApprovalRecord> = {}): ApprovalRecord {
    return {
        id,
        sessionId: 'sess-1',
        tool: 'fs.write',
        params: { path: '/tmp/out.txt', bytes: 12 },
        paths: ['/tmp/out.txt'],
        decision: 'pending',
        requestedAt: '2026-01-01T00:00:00.000Z',
        approvedAt: null,
        deniedAt: null,
        approver: null,
        comment: null,
        reason: 'write report',
        auto: false,
        whitelistExpiresAt: null,
        ...overrides,
    };
}

describe('RecordLog', () => {
    let dir: string;
    const logs: RecordLog[] = [];

    beforeEach(() => {
        dir = mkdtempSync(path.join(os.tmpdir(), 'steplock-record-log-'));
    });

    afterEach(() => {
        for (const log of logs.splice(0)) log.close();
        rmSync(dir, { recursive: true, force: true });
    });

    const open = (location = dir) => {
        const log = new RecordLog(location);
        logs.push(log);
        return log;
    };

    it('treats database paths as files and anything else as a directory', () => {
        expect(resolveRecordLogFile('/srv/steplock')).toBe('/srv/steplock/approvals.db');
        expect(resolveRecordLogFile('/srv/steplock/custom.sqlite')).toBe('/srv/steplock/custom.sqlite');
    });

    it('creates the database file inside the directory', () => {
        const log = open(path.join(dir, 'nested'));
        expect(log.file).toBe(path.join(dir, 'nested', 'approvals.db'));
        expect(existsSync(log.file)).toBe(true);
    });

    it('returns appended and updated records in insertion order after reopening', () => {
        const log = open();
        log.append(pendingRecord('b'));
        log.append(pendingRecord('a', { sessionId: 'sess-2' }));
        log.update(pendingRecord('b', {
            decision: 'approved',
            approvedAt: '2026-01-01T00:00:10.000Z',
            approver: 'alice',
            whitelistExpiresAt: '2026-01-01T00:01:10.000Z',
        }));
        log.close();

        const reopened = open();
        const records = reopened.load();

        expect(records.map((r) => r.id)).toEqual(['b', 'a']);
        expect(records[0]).toEqual(pendingRecord('b', {
            decision: 'approved',
            approvedAt: '2026-01-01T00:00:10.000Z',
            approver: 'alice',
            whitelistExpiresAt: '2026-01-01T00:01:10.000Z',
        }));
        expect(records[1].sessionId).toBe('sess-2');
    });

    it('reports persistence failures as RecordLogError', () => {
        const log = open();
        log.append(pendingRecord('dup'));

        expect(() => log.append(pendingRecord('dup'))).toThrow(RecordLogError);
        expect(() => log.update(pendingRecord('missing'))).toThrow("[RecordLog] No stored record 'missing' to update.");
    });

    it('rejects use after close and closes idempotently', () => {
        const log = open();
        log.close();
        log.close();

        expect(log.closed).toBe(true);
        expect(() => log.load()).toThrow(QueueClosedError);
        expect(() => log.append(pendingRecord('late'))).toThrow(QueueClosedError);
    });
});
