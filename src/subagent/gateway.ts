/**
 * Per-invocation tool gateway. Routes every attempted call through the
 * policy enforcer before it reaches a tool provider.
 */

import type { Logger } from 'pino';
import { CouncilError, ToolDeniedError } from '../errors.js';
import type { DispatchObserver } from '../observer/types.js';
import type { PolicyEnforcer } from '../policy/enforcer.js';
import type { AgentProfile } from '../profiles/types.js';
import type { ToolProvider } from '../tools/types.js';
import { errorMessage } from '../utils/error-message.js';
import type { InvocationRequest, ToolCallResult, ToolGateway } from './types.js';

export interface InvocationToolGatewayOptions {
  request: InvocationRequest;
  profile: AgentProfile;
  enforcer: PolicyEnforcer;
  provider: ToolProvider;
  signal: AbortSignal;
  observer?: DispatchObserver;
  logger: Logger;
}

export class InvocationToolGateway implements ToolGateway {
  private request: InvocationRequest;
  private profile: AgentProfile;
  private enforcer: PolicyEnforcer;
  private provider: ToolProvider;
  private signal: AbortSignal;
  private observer: DispatchObserver | undefined;
  private logger: Logger;
  private availableNames: readonly string[] | undefined;

  constructor(options: InvocationToolGatewayOptions) {
    this.request = options.request;
    this.profile = options.profile;
    this.enforcer = options.enforcer;
    this.provider = options.provider;
    this.signal = options.signal;
    this.observer = options.observer;
    this.logger = options.logger;
  }

  get available(): readonly string[] {
    if (!this.availableNames) {
      this.availableNames = Object.freeze(this.enforcer.usableTools(this.profile).map((t) => t.name));
    }
    return this.availableNames;
  }

  async call(toolName: string, input?: unknown): Promise<ToolCallResult> {
    if (this.signal.aborted) {
      return { ok: false, toolName, kind: 'cancelled', reason: 'invocation cancelled' };
    }

    const decision = this.enforcer.authorize(this.profile, toolName);
    this.observer?.onToolCall?.(this.request, decision);

    if (!decision.allowed) {
      this.logger.info(
        { requestId: this.request.requestId, agent: this.profile.name, tool: decision.toolName, reason: decision.reason },
        'Tool call denied'
      );
      return { ok: false, toolName: decision.toolName, kind: 'denied', reason: decision.reason };
    }

    try {
      const data = await this.provider.invoke(decision.toolName, input, this.signal);
      return { ok: true, toolName: decision.toolName, data };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.debug(
        { requestId: this.request.requestId, tool: decision.toolName, error: reason },
        'Tool provider error'
      );
      return { ok: false, toolName: decision.toolName, kind: 'provider-error', reason };
    }
  }

  async require(toolName: string, input?: unknown): Promise<unknown> {
    const result = await this.call(toolName, input);
    if (result.ok) return result.data;
    if (result.kind === 'denied') {
      throw new ToolDeniedError(result.toolName, result.reason);
    }
    throw new CouncilError(`Tool "${result.toolName}" failed: ${result.reason}`);
  }
}

/**
 * Provider used when none is configured; every permitted call fails as a
 * provider error.
 */
export const unavailableToolProvider: ToolProvider = {
  async invoke(toolName: string): Promise<unknown> {
    throw new Error(`No tool provider configured for "${toolName}"`);
  },
};
