export { WorkflowGraph, action, parallel, always } from './workflow/graph.js';
export { ExecutionContext, type ExecutionContextOptions } from './workflow/execution-context.js';
export { Executor, type ExecutorOptions } from './workflow/executor.js';
export * from './middleware/index.js';
export { ApprovalQueue, type ApprovalQueueOptions } from './services/approval/approval-queue.js';
export { RecordLog, resolveRecordLogFile } from './services/approval/record-log.js';
export { Whitelist, whitelistKey } from './services/approval/whitelist.js';
export { extractPaths, normalizePath } from './services/approval/paths.js';
export { createApiApp, startApiServer, DEFAULT_API_PORT, type ApiServerDeps } from './api/router.js';
export {
    DEFAULT_CONFIG,
    getConfigPath,
    mergeWithDefaults,
    readConfig,
    resolveApiSecret,
    writeConfig,
    type SteplockConfig,
} from './config/json-config.js';
export { createRuntime, type Runtime } from './core/runtime.js';
export { logThought, scrubSensitiveText, setLogDirectory } from './utils/logger.js';
export * from './types/workflow.js';
export * from './types/approval.js';
export * from './types/agent.js';
export type * from './types/api.js';
