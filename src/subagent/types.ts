/**
 * Sub-Agent Invocation Type Definitions
 *
 * Requests, outcomes and the contract with the opaque agent executor.
 */

export const SENTIMENTS = ['bullish', 'bearish', 'neutral'] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

/**
 * One unit of work in a batch
 */
export interface InvocationRequest {
  readonly requestId: string;
  readonly agentName: string;
  readonly taskPrompt: string;
  readonly submittedAt: number;
}

/**
 * Validated payload of a successful invocation
 */
export interface AgentResult {
  readonly sentiment: Sentiment;
  readonly confidence: number;
  readonly summary: string;
  readonly factors: readonly string[];
  /** Full parsed payload, including keys the engine does not interpret */
  readonly raw: unknown;
}

export type TimeoutReason = 'agent-deadline' | 'batch-deadline';

interface OutcomeBase {
  readonly requestId: string;
  readonly agentName: string;
}

export interface SuccessOutcome extends OutcomeBase {
  readonly status: 'success';
  readonly result: AgentResult;
  readonly durationMs: number;
}

export interface TimeoutOutcome extends OutcomeBase {
  readonly status: 'timeout';
  readonly reason: TimeoutReason;
  readonly durationMs: number;
}

export interface PolicyViolationOutcome extends OutcomeBase {
  readonly status: 'policy-violation';
  readonly toolName: string;
  readonly reason: string;
}

export interface ExecutorErrorOutcome extends OutcomeBase {
  readonly status: 'executor-error';
  readonly message: string;
  /** Offending payload when the error is a schema failure */
  readonly payload?: unknown;
}

export type InvocationOutcome =
  | SuccessOutcome
  | TimeoutOutcome
  | PolicyViolationOutcome
  | ExecutorErrorOutcome;

export type InvocationStatus = InvocationOutcome['status'];

export type ToolCallResult =
  | { ok: true; toolName: string; data: unknown }
  | { ok: false; toolName: string; kind: 'denied' | 'provider-error' | 'cancelled'; reason: string };

/**
 * The only route from an executing agent to tool providers. Every call is
 * authorised against the agent's profile first.
 */
export interface ToolGateway {
  /** Tool names the agent may call */
  readonly available: readonly string[];
  /** Attempt a tool call; refusals and provider errors come back as `ok: false` */
  call(toolName: string, input?: unknown): Promise<ToolCallResult>;
  /**
   * Like call(), but throws when the tool is unavailable. A policy refusal
   * throws ToolDeniedError, which ends the invocation as a policy violation.
   */
  require(toolName: string, input?: unknown): Promise<unknown>;
}

/**
 * Everything an executing agent can see. Built fresh per invocation; nothing
 * from earlier invocations is reachable from it.
 */
export interface ExecutorCall {
  readonly systemPrompt: string;
  readonly taskPrompt: string;
  readonly tools: ToolGateway;
  readonly signal: AbortSignal;
  readonly maxContextTokens: number;
  /** Report context tokens consumed; throws once the budget is exceeded */
  consumeTokens(count: number): void;
}

/**
 * Opaque, capability-bounded agent runtime (e.g. an LLM tool loop). Returns
 * the terminal structured payload or throws.
 */
export interface AgentExecutor {
  execute(call: ExecutorCall): Promise<unknown>;
}
