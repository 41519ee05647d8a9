// agent-council - subagent orchestration engine
// Main entry point for library usage

export * from './errors.js';
export * from './config/index.js';
export * from './tools/index.js';
export * from './profiles/index.js';
export * from './policy/index.js';
export * from './subagent/index.js';
export * from './aggregate/index.js';
export * from './observer/index.js';
export * from './executors/index.js';
export {
  Orchestrator,
  createOrchestrator,
  type OrchestratorOptions,
  type CreateOrchestratorOptions,
  type SubmitBatchOptions,
  type BatchReport,
} from './orchestrator.js';
export { createLogger } from './utils/logger.js';
