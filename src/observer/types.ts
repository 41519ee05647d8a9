/**
 * Dispatch observer hooks. An observer is passed in per batch; the engine
 * keeps no process-wide counters of its own.
 */

import type { AuthorizationDecision } from '../policy/enforcer.js';
import type { InvocationOutcome, InvocationRequest } from '../subagent/types.js';

export interface BatchStartEvent {
  batchId: string;
  requests: readonly InvocationRequest[];
  concurrencyLimit: number;
}

export interface BatchEndEvent {
  batchId: string;
  outcomes: readonly InvocationOutcome[];
  durationMs: number;
}

export interface DispatchObserver {
  onBatchStart?(event: BatchStartEvent): void;
  onInvocationStart?(request: InvocationRequest): void;
  onToolCall?(request: InvocationRequest, decision: AuthorizationDecision): void;
  onInvocationEnd?(outcome: InvocationOutcome): void;
  onBatchEnd?(event: BatchEndEvent): void;
}
