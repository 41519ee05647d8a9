/**
 * Sub-Agent Invocation Engine
 *
 * Runs capability-restricted subagents in bounded-concurrency batches.
 */

export type {
  AgentExecutor,
  AgentResult,
  ExecutorCall,
  ExecutorErrorOutcome,
  InvocationOutcome,
  InvocationRequest,
  InvocationStatus,
  PolicyViolationOutcome,
  Sentiment,
  SuccessOutcome,
  TimeoutOutcome,
  TimeoutReason,
  ToolCallResult,
  ToolGateway,
} from './types.js';

export { SENTIMENTS } from './types.js';
export { createRequest } from './request.js';
export { extractPayload, parseAgentResult, type ParseAgentResult } from './result-schema.js';
export { InvocationToolGateway, unavailableToolProvider } from './gateway.js';
export { InvocationExecutor, type InvocationExecutorOptions, type RunOptions } from './executor.js';
export { InvocationRegistry, type InvocationState } from './registry.js';
export { Dispatcher, type DispatcherOptions, type RunBatchOptions } from './dispatcher.js';
