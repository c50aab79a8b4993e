export { MiddlewarePipeline } from './pipeline.js';
export {
    ApprovalMiddleware,
    DEFAULT_APPROVAL_KEYS,
    parseApprovalRequests,
    type ApprovalContextKeys,
    type ApprovalMiddlewareOptions,
} from './approval-middleware.js';
export { TodoListMiddleware, DEFAULT_TODO_KEYS, parseChecklist, type TodoContextKeys } from './todo-list-middleware.js';
export {
    SummarizationMiddleware,
    DEFAULT_SUMMARY_KEYS,
    DEFAULT_SUMMARY_MANUAL_KEY,
    type SummarizationMiddlewareOptions,
    type SummaryContextKeys,
} from './summarization-middleware.js';
export { SubAgentMiddleware, DEFAULT_SUBAGENT_KEYS, type SubAgentContextKeys } from './subagent-middleware.js';
export { StepLoggingMiddleware } from './step-logging-middleware.js';
