import type { ExecutionContext } from '../workflow/execution-context.js';

export type NodeKind = 'action' | 'parallel';

/** Body of an action node. Throwing (or rejecting) fails the run. */
export type ActionFn = (ctx: ExecutionContext) => void | Promise<void>;

/** Transition guard. Must only observe the context. */
export type Condition = (ctx: ExecutionContext) => boolean | Promise<boolean>;

export interface ActionNode {
    kind: 'action';
    name: string;
    run: ActionFn;
}

export interface ParallelNode {
    kind: 'parallel';
    name: string;
    /** Nodes started concurrently, each as its own sub-walk of the graph. */
    branches: string[];
    /**
     * Node where the branches converge. Inferred from the transitions when
     * omitted; without a join the branches run until they terminate.
     */
    join?: string;
}

export type WorkflowNode = ActionNode | ParallelNode;

export interface Transition {
    from: string;
    to: string;
    condition: Condition;
}

/** Identifies the node being entered or exited. Never persisted. */
export interface Step {
    name: string;
    kind: NodeKind;
    /** Branch node name when the step runs inside a parallel sub-walk. */
    branch?: string;
}

export interface WorkflowMiddleware {
    readonly name: string;
    beforeStep?(ctx: ExecutionContext, step: Step): void | Promise<void>;
    afterStep?(ctx: ExecutionContext, step: Step, error: Error | null): void | Promise<void>;
}

export interface ExecutionResult {
    /** Node names in the order they were entered; parallel branches interleave. */
    visited: string[];
    steps: number;
}

export class GraphValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GraphValidationError';
    }
}

export class WorkflowCancelledError extends Error {
    constructor(message = 'Workflow run was cancelled.') {
        super(message);
        this.name = 'WorkflowCancelledError';
    }
}

export class DeadlineExceededError extends Error {
    readonly deadline: string;

    constructor(deadline: Date) {
        super(`Workflow deadline ${deadline.toISOString()} exceeded.`);
        this.name = 'DeadlineExceededError';
        this.deadline = deadline.toISOString();
    }
}

export class StepLimitExceededError extends Error {
    readonly limit: number;

    constructor(limit: number) {
        super(`Workflow exceeded the configured limit of ${limit} steps.`);
        this.name = 'StepLimitExceededError';
        this.limit = limit;
    }
}

export class ParallelBranchError extends Error {
    readonly node: string;
    readonly branch: string;

    constructor(node: string, branch: string, cause: Error) {
        super(`Branch '${branch}' of parallel node '${node}' failed: ${cause.message}`, { cause });
        this.name = 'ParallelBranchError';
        this.node = node;
        this.branch = branch;
    }
}

/** Normalise anything thrown by user code into an Error. */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
