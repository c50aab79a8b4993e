import { DeadlineExceededError, WorkflowCancelledError } from '../types/workflow.js';

export interface ExecutionContextOptions {
    /** Caller's cancellation signal; aborting it cancels the run. */
    signal?: AbortSignal;
    /** Absolute deadline for the run. */
    deadline?: Date;
    /** Relative deadline; ignored when `deadline` is given. 0 disables. */
    timeoutMs?: number;
    now?: () => Date;
}

/**
 * Per-run key/value store shared by node bodies, conditions, middleware and
 * parallel branches.
 *
 * Single reads and writes are atomic on the event loop. Anything that reads,
 * awaits and writes back must go through {@link update} or {@link withLock},
 * which serialise on one lock for the whole store.
 */
export class ExecutionContext {
    readonly #values: Map<string, unknown>;
    readonly #controller = new AbortController();
    readonly #deadline: Date | null;
    readonly #now: () => Date;
    #timer: NodeJS.Timeout | null = null;
    #lockTail: Promise<void> = Promise.resolve();
    #detachParent: (() => void) | null = null;

    constructor(initial: Record<string, unknown> = {}, options: ExecutionContextOptions = {}) {
        this.#values = new Map(Object.entries(initial));
        this.#now = options.now ?? (() => new Date());

        if (options.deadline) {
            this.#deadline = options.deadline;
        } else if (options.timeoutMs && options.timeoutMs > 0) {
            this.#deadline = new Date(this.#now().getTime() + options.timeoutMs);
        } else {
            this.#deadline = null;
        }

        const parent = options.signal;
        if (parent) {
            if (parent.aborted) {
                this.#controller.abort(this.#cancellationReason(parent.reason));
            } else {
                const onAbort = () => this.#controller.abort(this.#cancellationReason(parent.reason));
                parent.addEventListener('abort', onAbort, { once: true });
                this.#detachParent = () => parent.removeEventListener('abort', onAbort);
            }
        }

        if (this.#deadline && !this.#controller.signal.aborted) {
            const deadline = this.#deadline;
            const remaining = deadline.getTime() - this.#now().getTime();
            if (remaining <= 0) {
                this.#controller.abort(new DeadlineExceededError(deadline));
            } else {
                this.#timer = setTimeout(() => {
                    this.#controller.abort(new DeadlineExceededError(deadline));
                }, remaining);
                this.#timer.unref();
            }
        }
    }

    get signal(): AbortSignal {
        return this.#controller.signal;
    }

    get deadline(): Date | null {
        return this.#deadline;
    }

    get cancelled(): boolean {
        return this.#controller.signal.aborted;
    }

    /** Milliseconds until the deadline, or null without one. */
    remainingMs(): number | null {
        if (!this.#deadline) return null;
        return Math.max(0, this.#deadline.getTime() - this.#now().getTime());
    }

    get(key: string): unknown {
        return this.#values.get(key);
    }

    /** Read a string value, ignoring values of any other type. */
    getString(key: string): string | undefined {
        const value = this.#values.get(key);
        return typeof value === 'string' ? value : undefined;
    }

    /** Read a numeric value, ignoring values of any other type. */
    getNumber(key: string): number | undefined {
        const value = this.#values.get(key);
        return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
    }

    has(key: string): boolean {
        return this.#values.has(key);
    }

    set(key: string, value: unknown): void {
        this.#values.set(key, value);
    }

    delete(key: string): boolean {
        return this.#values.delete(key);
    }

    /** Shallow copy of the store. */
    snapshot(): Record<string, unknown> {
        return Object.fromEntries(this.#values);
    }

    /**
     * Run `fn` while holding the store lock. Calls are served in arrival order.
     */
    async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
        const previous = this.#lockTail;
        let release: () => void = () => undefined;
        this.#lockTail = new Promise<void>((resolve) => {
            release = resolve;
        });

        await previous;
        try {
            return await fn();
        } finally {
            release();
        }
    }

    /** Atomically replace `key` with `fn(current)`. */
    async update<T>(key: string, fn: (current: unknown) => T | Promise<T>): Promise<T> {
        return this.withLock(async () => {
            const next = await fn(this.#values.get(key));
            this.#values.set(key, next);
            return next;
        });
    }

    /** Cancel the run. Waits observing {@link signal} return promptly. */
    cancel(reason?: unknown): void {
        if (this.#controller.signal.aborted) return;
        this.#controller.abort(this.#cancellationReason(reason));
    }

    /** Throw the cancellation reason when the run has been cancelled. */
    throwIfCancelled(): void {
        const { signal } = this.#controller;
        if (signal.aborted) {
            throw this.#cancellationReason(signal.reason);
        }
    }

    /** Release the deadline timer and the parent signal listener. */
    dispose(): void {
        if (this.#timer) {
            clearTimeout(this.#timer);
            this.#timer = null;
        }
        this.#detachParent?.();
        this.#detachParent = null;
    }

    #cancellationReason(reason: unknown): Error {
        if (reason instanceof DeadlineExceededError || reason instanceof WorkflowCancelledError) {
            return reason;
        }
        if (reason instanceof Error && reason.name !== 'AbortError') {
            return reason;
        }
        return new WorkflowCancelledError();
    }
}
