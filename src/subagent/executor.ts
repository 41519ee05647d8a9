/**
 * InvocationExecutor: runs one subagent invocation against the opaque
 * agent executor.
 *
 * Each run gets:
 * - A fresh tool gateway bound to the agent's profile
 * - Its own context token budget
 * - A hard deadline via AbortController
 * - Schema validation of the terminal payload
 *
 * At most one outcome is produced per request; output arriving after the
 * deadline is discarded.
 */

import type { Logger } from 'pino';
import { ContextBudgetExceededError, ToolDeniedError } from '../errors.js';
import type { DispatchObserver } from '../observer/types.js';
import type { PolicyEnforcer } from '../policy/enforcer.js';
import type { AgentProfile } from '../profiles/types.js';
import type { ToolProvider } from '../tools/types.js';
import { errorMessage } from '../utils/error-message.js';
import { InvocationToolGateway, unavailableToolProvider } from './gateway.js';
import { parseAgentResult } from './result-schema.js';
import type {
  AgentExecutor,
  ExecutorCall,
  InvocationOutcome,
  InvocationRequest,
  TimeoutReason,
} from './types.js';

export interface InvocationExecutorOptions {
  agentExecutor: AgentExecutor;
  enforcer: PolicyEnforcer;
  toolProvider?: ToolProvider;
  logger: Logger;
}

export interface RunOptions {
  /** Cancellation from the enclosing batch */
  signal?: AbortSignal;
  observer?: DispatchObserver;
}

interface ExecutionWindow {
  deadline: number;
  deadlineReason: TimeoutReason;
  startedAt: number;
}

/**
 * Token counter for one invocation. Throws once cumulative usage passes the
 * profile's limit.
 */
function createTokenBudget(limit: number): (count: number) => void {
  let used = 0;
  return (count: number) => {
    if (!Number.isFinite(count) || count < 0) return;
    used += count;
    if (used > limit) {
      throw new ContextBudgetExceededError(used, limit);
    }
  };
}

export class InvocationExecutor {
  private agentExecutor: AgentExecutor;
  private enforcer: PolicyEnforcer;
  private toolProvider: ToolProvider;
  private logger: Logger;

  constructor(options: InvocationExecutorOptions) {
    this.agentExecutor = options.agentExecutor;
    this.enforcer = options.enforcer;
    this.toolProvider = options.toolProvider ?? unavailableToolProvider;
    this.logger = options.logger.child({ module: 'invocation-executor' });
  }

  /**
   * Run one request. Never rejects: every failure is an outcome variant.
   *
   * @param deadline - Absolute epoch ms imposed by the caller (Infinity for none).
   *   The effective deadline is the earlier of this and the profile's maxDurationMs.
   */
  async run(
    request: InvocationRequest,
    profile: AgentProfile,
    deadline: number,
    options: RunOptions = {}
  ): Promise<InvocationOutcome> {
    const startedAt = Date.now();
    const agentDeadline = startedAt + profile.maxDurationMs;
    const effectiveDeadline = Math.min(deadline, agentDeadline);
    const deadlineReason: TimeoutReason = deadline < agentDeadline ? 'batch-deadline' : 'agent-deadline';
    const parent = options.signal;

    const timeoutOutcome = (reason: TimeoutReason): InvocationOutcome =>
      Object.freeze({
        status: 'timeout',
        requestId: request.requestId,
        agentName: request.agentName,
        reason,
        durationMs: Date.now() - startedAt,
      });

    if (parent?.aborted) {
      return timeoutOutcome('batch-deadline');
    }

    const controller = new AbortController();
    let timeoutReason: TimeoutReason | undefined;
    const abort = (reason: TimeoutReason) => {
      if (controller.signal.aborted) return;
      timeoutReason = reason;
      controller.abort();
    };

    const onParentAbort = () => abort('batch-deadline');
    parent?.addEventListener('abort', onParentAbort, { once: true });

    const timedOut = new Promise<InvocationOutcome>((resolve) => {
      controller.signal.addEventListener(
        'abort',
        () => resolve(timeoutOutcome(timeoutReason ?? deadlineReason)),
        { once: true }
      );
    });
    const timer = setTimeout(() => abort(deadlineReason), Math.max(0, effectiveDeadline - startedAt));

    try {
      const outcome = await Promise.race([
        this.execute(request, profile, controller.signal, { deadline: effectiveDeadline, deadlineReason, startedAt }, options.observer),
        timedOut,
      ]);

      if (outcome.status === 'timeout') {
        this.logger.warn(
          { requestId: request.requestId, agent: request.agentName, reason: outcome.reason, durationMs: outcome.durationMs },
          'Invocation timed out'
        );
      }
      return outcome;
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  private async execute(
    request: InvocationRequest,
    profile: AgentProfile,
    signal: AbortSignal,
    window: ExecutionWindow,
    observer: DispatchObserver | undefined
  ): Promise<InvocationOutcome> {
    const { deadline, deadlineReason, startedAt } = window;
    const base = { requestId: request.requestId, agentName: request.agentName };

    const call: ExecutorCall = Object.freeze({
      systemPrompt: profile.systemPrompt,
      taskPrompt: request.taskPrompt,
      tools: new InvocationToolGateway({
        request,
        profile,
        enforcer: this.enforcer,
        provider: this.toolProvider,
        signal,
        observer,
        logger: this.logger,
      }),
      signal,
      maxContextTokens: profile.maxContextTokens,
      consumeTokens: createTokenBudget(profile.maxContextTokens),
    });

    let payload: unknown;
    try {
      payload = await this.agentExecutor.execute(call);
    } catch (error) {
      if (error instanceof ToolDeniedError) {
        return Object.freeze({
          ...base,
          status: 'policy-violation',
          toolName: error.toolName,
          reason: error.reason,
        });
      }
      const message = errorMessage(error);
      this.logger.warn({ ...base, error: message }, 'Agent executor failed');
      return Object.freeze({ ...base, status: 'executor-error', message });
    }

    // A result that lands on or after the deadline is not delivered
    if (signal.aborted || Date.now() >= deadline) {
      return Object.freeze({
        ...base,
        status: 'timeout',
        reason: deadlineReason,
        durationMs: Date.now() - startedAt,
      });
    }

    const parsed = parseAgentResult(payload, profile.outputSchema);
    if (!parsed.ok) {
      this.logger.warn({ ...base, payload, error: parsed.error }, 'Agent result failed schema validation');
      return Object.freeze({
        ...base,
        status: 'executor-error',
        message: `Invalid agent result: ${parsed.error}`,
        payload,
      });
    }

    const durationMs = Date.now() - startedAt;
    this.logger.debug({ ...base, durationMs, sentiment: parsed.result.sentiment }, 'Invocation succeeded');
    return Object.freeze({ ...base, status: 'success', result: parsed.result, durationMs });
  }
}
