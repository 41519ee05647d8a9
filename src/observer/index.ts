export type { DispatchObserver, BatchStartEvent, BatchEndEvent } from './types.js';
export { composeObservers } from './compose.js';
export { createLoggingObserver } from './logging.js';
export {
  ActivityTracker,
  type AgentStats,
  type InvocationRecord,
  type SessionStats,
  type ToolCallRecord,
} from './activity-tracker.js';
export { renderSessionReport, formatDuration } from './session-report.js';
