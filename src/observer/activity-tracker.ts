/**
 * ActivityTracker: records what each agent did during one batch: when it
 * ran, how long it took, how it ended and which tools it tried.
 *
 * One tracker per batch (or per session of batches); nothing global.
 */

import type { AuthorizationDecision } from '../policy/enforcer.js';
import type { InvocationOutcome, InvocationRequest, InvocationStatus } from '../subagent/types.js';
import type { BatchEndEvent, BatchStartEvent, DispatchObserver } from './types.js';

export interface ToolCallRecord {
  requestId: string;
  agentName: string;
  toolName: string;
  allowed: boolean;
  reason?: string;
  timestamp: number;
}

export interface InvocationRecord {
  batchId?: string;
  requestId: string;
  agentName: string;
  taskPrompt: string;
  startedAt: number;
  endedAt?: number;
  durationMs?: number;
  status?: InvocationStatus;
}

export interface AgentStats {
  agentName: string;
  invocations: number;
  completed: number;
  totalDurationMs: number;
  avgDurationMs: number;
  toolCalls: number;
  deniedToolCalls: number;
  statuses: Partial<Record<InvocationStatus, number>>;
}

export interface SessionStats {
  sessionId: string;
  startedAt: number;
  endedAt?: number;
  durationMs: number;
  batches: number;
  invocations: number;
  toolCalls: number;
  deniedToolCalls: number;
  uniqueAgents: number;
}

export class ActivityTracker implements DispatchObserver {
  readonly sessionId: string;
  readonly startedAt: number;
  private endedAt: number | undefined;
  private batchIds: string[] = [];
  private invocations: InvocationRecord[] = [];
  // Started but not yet ended, by requestId; ids are only unique within a batch
  private open: Map<string, InvocationRecord[]> = new Map();
  private currentBatchId: string | undefined;
  private toolCalls: ToolCallRecord[] = [];
  private now: () => number;

  constructor(options: { sessionId?: string; now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.sessionId = options.sessionId ?? new Date(this.startedAt).toISOString().replace(/[-:]/g, '').slice(0, 15);
  }

  onBatchStart(event: BatchStartEvent): void {
    this.batchIds.push(event.batchId);
    this.currentBatchId = event.batchId;
  }

  onInvocationStart(request: InvocationRequest): void {
    const record: InvocationRecord = {
      batchId: this.currentBatchId,
      requestId: request.requestId,
      agentName: request.agentName,
      taskPrompt: request.taskPrompt,
      startedAt: this.now(),
    };
    this.invocations.push(record);
    const pending = this.open.get(request.requestId) ?? [];
    pending.push(record);
    this.open.set(request.requestId, pending);
  }

  onToolCall(request: InvocationRequest, decision: AuthorizationDecision): void {
    this.toolCalls.push({
      requestId: request.requestId,
      agentName: request.agentName,
      toolName: decision.toolName,
      allowed: decision.allowed,
      reason: decision.allowed ? undefined : decision.reason,
      timestamp: this.now(),
    });
  }

  onInvocationEnd(outcome: InvocationOutcome): void {
    const endedAt = this.now();
    let record = this.open.get(outcome.requestId)?.shift();
    if (!record) {
      // Never started: cancelled while still queued
      record = {
        batchId: this.currentBatchId,
        requestId: outcome.requestId,
        agentName: outcome.agentName,
        taskPrompt: '',
        startedAt: endedAt,
      };
      this.invocations.push(record);
    }
    record.endedAt = endedAt;
    record.durationMs = endedAt - record.startedAt;
    record.status = outcome.status;
  }

  onBatchEnd(_event: BatchEndEvent): void {
    this.endedAt = this.now();
  }

  getInvocations(): InvocationRecord[] {
    return [...this.invocations];
  }

  getToolCalls(): ToolCallRecord[] {
    return [...this.toolCalls];
  }

  /** Tool call counts by tool name, including denied attempts */
  getToolCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const call of this.toolCalls) {
      counts[call.toolName] = (counts[call.toolName] ?? 0) + 1;
    }
    return counts;
  }

  /** Tool call counts grouped by agent */
  getAgentToolCounts(): Record<string, Record<string, number>> {
    const counts: Record<string, Record<string, number>> = {};
    for (const call of this.toolCalls) {
      const perAgent = (counts[call.agentName] ??= {});
      perAgent[call.toolName] = (perAgent[call.toolName] ?? 0) + 1;
    }
    return counts;
  }

  getAgentStats(): AgentStats[] {
    const stats = new Map<string, AgentStats>();
    const entry = (agentName: string): AgentStats => {
      let s = stats.get(agentName);
      if (!s) {
        s = {
          agentName,
          invocations: 0,
          completed: 0,
          totalDurationMs: 0,
          avgDurationMs: 0,
          toolCalls: 0,
          deniedToolCalls: 0,
          statuses: {},
        };
        stats.set(agentName, s);
      }
      return s;
    };

    for (const record of this.invocations) {
      const s = entry(record.agentName);
      s.invocations++;
      if (record.status) {
        s.completed++;
        s.totalDurationMs += record.durationMs ?? 0;
        s.statuses[record.status] = (s.statuses[record.status] ?? 0) + 1;
      }
    }
    for (const call of this.toolCalls) {
      const s = entry(call.agentName);
      s.toolCalls++;
      if (!call.allowed) s.deniedToolCalls++;
    }
    for (const s of stats.values()) {
      s.avgDurationMs = s.completed > 0 ? Math.round(s.totalDurationMs / s.completed) : 0;
    }

    return Array.from(stats.values()).sort((a, b) => a.agentName.localeCompare(b.agentName));
  }

  getSessionStats(): SessionStats {
    const end = this.endedAt ?? this.now();
    return {
      sessionId: this.sessionId,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      durationMs: end - this.startedAt,
      batches: this.batchIds.length,
      invocations: this.invocations.length,
      toolCalls: this.toolCalls.length,
      deniedToolCalls: this.toolCalls.filter((c) => !c.allowed).length,
      uniqueAgents: new Set(this.invocations.map((r) => r.agentName)).size,
    };
  }
}
