import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import {
    QueueClosedError,
    RecordLogError,
    type ApprovalDecision,
    type ApprovalRecord,
} from '../../types/approval.js';
import { isRecord, isStringArray } from '../../utils/guards.js';

const DEFAULT_FILE_NAME = 'approvals.db';
const DATABASE_FILE_PATTERN = /\.(db|sqlite|sqlite3)$/i;
const DECISIONS: readonly ApprovalDecision[] = ['pending', 'approved', 'denied'];

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS approval_records (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    session_id TEXT NOT NULL,
    tool TEXT NOT NULL,
    params_json TEXT NOT NULL,
    paths_json TEXT NOT NULL,
    decision TEXT NOT NULL CHECK (decision IN ('pending', 'approved', 'denied')),
    requested_at TEXT NOT NULL,
    approved_at TEXT,
    denied_at TEXT,
    approver TEXT,
    comment TEXT,
    reason TEXT,
    auto INTEGER NOT NULL DEFAULT 0,
    whitelist_expires_at TEXT,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_approval_records_session
    ON approval_records(session_id, decision);
`;

/** A database file path is used as is; anything else is a directory. */
export function resolveRecordLogFile(location: string): string {
    const resolved = path.resolve(location);
    return DATABASE_FILE_PATTERN.test(resolved) ? resolved : path.join(resolved, DEFAULT_FILE_NAME);
}

function isDecision(value: unknown): value is ApprovalDecision {
    return typeof value === 'string' && DECISIONS.some((decision) => decision === value);
}

function nullableString(row: Record<string, unknown>, column: string): string | null {
    const value = row[column];
    if (value === null || value === undefined) return null;
    if (typeof value !== 'string') {
        throw new RecordLogError(`[RecordLog] Column '${column}' holds a non-string value.`);
    }
    return value;
}

function requiredString(row: Record<string, unknown>, column: string): string {
    const value = nullableString(row, column);
    if (value === null) {
        throw new RecordLogError(`[RecordLog] Column '${column}' is empty.`);
    }
    return value;
}

function parseJsonColumn(row: Record<string, unknown>, column: string): unknown {
    const raw = requiredString(row, column);
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch (error) {
        throw new RecordLogError(`[RecordLog] Column '${column}' holds invalid JSON.`, error);
    }
}

function decodeRow(row: unknown): ApprovalRecord {
    if (!isRecord(row)) {
        throw new RecordLogError('[RecordLog] Unexpected row shape.');
    }

    const decision = row.decision;
    if (!isDecision(decision)) {
        throw new RecordLogError(`[RecordLog] Unknown decision '${String(decision)}'.`);
    }
    const params = parseJsonColumn(row, 'params_json');
    if (!isRecord(params)) {
        throw new RecordLogError('[RecordLog] Column params_json is not an object.');
    }
    const paths = parseJsonColumn(row, 'paths_json');
    if (!isStringArray(paths)) {
        throw new RecordLogError('[RecordLog] Column paths_json is not a string array.');
    }

    return {
        id: requiredString(row, 'id'),
        sessionId: requiredString(row, 'session_id'),
        tool: requiredString(row, 'tool'),
        params,
        paths,
        decision,
        requestedAt: requiredString(row, 'requested_at'),
        approvedAt: nullableString(row, 'approved_at'),
        deniedAt: nullableString(row, 'denied_at'),
        approver: nullableString(row, 'approver'),
        comment: nullableString(row, 'comment'),
        reason: nullableString(row, 'reason'),
        auto: row.auto === 1,
        whitelistExpiresAt: nullableString(row, 'whitelist_expires_at'),
    };
}

function encodeRecord(record: ApprovalRecord): Record<string, string | number | null> {
    return {
        id: record.id,
        session_id: record.sessionId,
        tool: record.tool,
        params_json: JSON.stringify(record.params),
        paths_json: JSON.stringify(record.paths),
        decision: record.decision,
        requested_at: record.requestedAt,
        approved_at: record.approvedAt,
        denied_at: record.deniedAt,
        approver: record.approver,
        comment: record.comment,
        reason: record.reason,
        auto: record.auto ? 1 : 0,
        whitelist_expires_at: record.whitelistExpiresAt,
        updated_at: new Date().toISOString(),
    };
}

/**
 * Durable store of approval records backed by one SQLite file.
 *
 * Every write is a single statement and therefore its own transaction; with
 * WAL and `synchronous = FULL` a committed record survives a crash and a
 * torn write never reaches a committed row.
 */
export class RecordLog {
    readonly #file: string;
    readonly #db: BetterSqlite3.Database;

    constructor(location: string) {
        this.#file = resolveRecordLogFile(location);
        try {
            mkdirSync(path.dirname(this.#file), { recursive: true });
            this.#db = new Database(this.#file);
            this.#db.pragma('journal_mode = WAL');
            this.#db.pragma('synchronous = FULL');
            this.#db.exec(SCHEMA);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new RecordLogError(`[RecordLog] Failed to open ${this.#file}: ${message}`, error);
        }
    }

    get file(): string {
        return this.#file;
    }

    get closed(): boolean {
        return !this.#db.open;
    }

    append(record: ApprovalRecord): void {
        this.#write('append', record.id, () => {
            this.#db.prepare(`
                INSERT INTO approval_records (
                    id, session_id, tool, params_json, paths_json, decision, requested_at,
                    approved_at, denied_at, approver, comment, reason, auto, whitelist_expires_at, updated_at
                ) VALUES (
                    @id, @session_id, @tool, @params_json, @paths_json, @decision, @requested_at,
                    @approved_at, @denied_at, @approver, @comment, @reason, @auto, @whitelist_expires_at, @updated_at
                )
            `).run(encodeRecord(record));
        });
    }

    update(record: ApprovalRecord): void {
        this.#write('update', record.id, () => {
            const result = this.#db.prepare(`
                UPDATE approval_records SET
                    decision = @decision,
                    approved_at = @approved_at,
                    denied_at = @denied_at,
                    approver = @approver,
                    comment = @comment,
                    auto = @auto,
                    whitelist_expires_at = @whitelist_expires_at,
                    updated_at = @updated_at
                WHERE id = @id
            `).run(encodeRecord(record));
            if (result.changes !== 1) {
                throw new RecordLogError(`[RecordLog] No stored record '${record.id}' to update.`);
            }
        });
    }

    /** Every stored record in insertion order. */
    load(): ApprovalRecord[] {
        this.#assertOpen();
        const rows: unknown[] = this.#db.prepare('SELECT * FROM approval_records ORDER BY seq ASC').all();
        return rows.map((row) => decodeRow(row));
    }

    close(): void {
        if (this.#db.open) {
            this.#db.close();
        }
    }

    #write(operation: 'append' | 'update', id: string, fn: () => void): void {
        this.#assertOpen();
        try {
            fn();
        } catch (error) {
            if (error instanceof RecordLogError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new RecordLogError(`[RecordLog] Failed to ${operation} record '${id}': ${message}`, error);
        }
    }

    #assertOpen(): void {
        if (!this.#db.open) {
            throw new QueueClosedError();
        }
    }
}
