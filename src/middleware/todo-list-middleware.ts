import type { TodoItem, TodoStatus } from '../types/agent.js';
import type { Step, WorkflowMiddleware } from '../types/workflow.js';
import type { ExecutionContext } from '../workflow/execution-context.js';

export interface TodoContextKeys {
    text: string;
    items: string;
}

export const DEFAULT_TODO_KEYS: Readonly<TodoContextKeys> = {
    text: 'workflow.todo.text',
    items: 'workflow.todo.items',
};

const CHECKLIST_LINE = /^\s*[-*+]\s+\[([ xX~])\]\s+(.+?)\s*$/;

function statusOf(marker: string): TodoStatus {
    if (marker === '~') return 'in_progress';
    if (marker === 'x' || marker === 'X') return 'completed';
    return 'pending';
}

/** Parse markdown checklist lines; other lines are ignored. */
export function parseChecklist(text: string): TodoItem[] {
    const items: TodoItem[] = [];
    for (const line of text.split(/\r?\n/)) {
        const match = CHECKLIST_LINE.exec(line);
        if (!match) continue;
        items.push({ text: match[2], status: statusOf(match[1]) });
    }
    return items;
}

/**
 * Keeps a structured todo list in sync with the checklist text a body writes
 * to the context. The list is re-read before and after every step.
 */
export class TodoListMiddleware implements WorkflowMiddleware {
    readonly name = 'todo-list';
    readonly #keys: TodoContextKeys;
    #items: TodoItem[] = [];

    constructor(options: { keys?: Partial<TodoContextKeys> } = {}) {
        this.#keys = { ...DEFAULT_TODO_KEYS, ...options.keys };
    }

    beforeStep(ctx: ExecutionContext, _step: Step): void {
        this.#sync(ctx);
    }

    afterStep(ctx: ExecutionContext, _step: Step, _error: Error | null): void {
        this.#sync(ctx);
    }

    list(): TodoItem[] {
        return this.#items.map((item) => ({ ...item }));
    }

    #sync(ctx: ExecutionContext): void {
        const text = ctx.getString(this.#keys.text);
        if (text === undefined) return;
        this.#items = parseChecklist(text);
        ctx.set(this.#keys.items, this.list());
    }
}
