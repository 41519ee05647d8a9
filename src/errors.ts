/**
 * Error taxonomy for the orchestration engine.
 *
 * Configuration errors (unknown tool/agent, invalid profile) are raised at
 * load time. Invocation-level failures are never thrown out of a batch; they
 * become outcome variants. The remaining classes are thrown inside a single
 * invocation and mapped to an outcome by the executor.
 */

export class CouncilError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'CouncilError';
  }
}

export class UnknownToolError extends CouncilError {
  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class UnknownAgentError extends CouncilError {
  constructor(public readonly agentName: string) {
    super(`Unknown agent: ${agentName}`);
    this.name = 'UnknownAgentError';
  }
}

/**
 * Profile definition rejected at load. Carries the agent name when the
 * problem is specific to one profile.
 */
export class ProfileValidationError extends CouncilError {
  constructor(
    message: string,
    public readonly agentName?: string,
    cause?: unknown
  ) {
    super(agentName ? `${agentName}: ${message}` : message, cause);
    this.name = 'ProfileValidationError';
  }
}

export class InvalidBatchError extends CouncilError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBatchError';
  }
}

/**
 * Thrown by ToolGateway.require() when the agent cannot continue without a
 * tool the policy refused. Surfaces as a policy-violation outcome.
 */
export class ToolDeniedError extends CouncilError {
  constructor(
    public readonly toolName: string,
    public readonly reason: string
  ) {
    super(`Tool "${toolName}" denied: ${reason}`);
    this.name = 'ToolDeniedError';
  }
}

export class ContextBudgetExceededError extends CouncilError {
  constructor(
    public readonly used: number,
    public readonly limit: number
  ) {
    super(`Context token budget exceeded: ${used}/${limit} tokens used`);
    this.name = 'ContextBudgetExceededError';
  }
}
