export type TodoStatus = 'pending' | 'in_progress' | 'completed';

export interface TodoItem {
    text: string;
    status: TodoStatus;
}

export interface ChatMessage {
    role: string;
    content: string;
}

/** Condenses a conversation into one summary message. */
export interface Summarizer {
    summarize(messages: ChatMessage[], signal: AbortSignal): Promise<string>;
}

export interface SubAgentRequest {
    instruction: string;
    metadata?: Record<string, unknown>;
}

export interface SubAgentResult {
    output: string;
    metadata?: Record<string, unknown>;
}

/** Runs one delegated task. Implementations should honour the signal. */
export interface SubAgentDelegate {
    delegate(request: SubAgentRequest, signal: AbortSignal): Promise<SubAgentResult>;
}

export class MiddlewareInputError extends Error {
    readonly key: string;

    constructor(key: string, message: string) {
        super(`Context key '${key}': ${message}`);
        this.name = 'MiddlewareInputError';
        this.key = key;
    }
}
