/**
 * Orchestrator: caller-facing entry point. Runs a batch through the
 * dispatcher and folds the outcomes into one composite signal.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { aggregate, type CompositeSignal } from './aggregate/aggregator.js';
import type { Config, DispatchConfig } from './config/config.js';
import { resolveDefinitionPaths } from './config/paths.js';
import { composeObservers } from './observer/compose.js';
import { createLoggingObserver } from './observer/logging.js';
import type { DispatchObserver } from './observer/types.js';
import { PolicyEnforcer } from './policy/enforcer.js';
import { loadProfileStore, type AgentProfileStore } from './profiles/store.js';
import { Dispatcher } from './subagent/dispatcher.js';
import { InvocationExecutor } from './subagent/executor.js';
import type { AgentExecutor, InvocationOutcome, InvocationRequest } from './subagent/types.js';
import { loadToolRegistry, type ToolRegistry } from './tools/registry.js';
import type { ToolProvider } from './tools/types.js';

export interface OrchestratorOptions {
  registry: ToolRegistry;
  profiles: AgentProfileStore;
  agentExecutor: AgentExecutor;
  toolProvider?: ToolProvider;
  logger: Logger;
  dispatch?: Partial<DispatchConfig>;
}

export interface SubmitBatchOptions {
  concurrencyLimit?: number;
  batchDeadlineMs?: number;
  observer?: DispatchObserver;
}

export interface BatchReport {
  batchId: string;
  signal: CompositeSignal;
  /** Raw outcomes, for logging and audit */
  outcomes: InvocationOutcome[];
}

export class Orchestrator {
  readonly registry: ToolRegistry;
  readonly profiles: AgentProfileStore;
  readonly enforcer: PolicyEnforcer;
  private dispatcher: Dispatcher;
  private logger: Logger;
  private defaults: { concurrencyLimit: number; batchDeadlineMs?: number };

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.profiles = options.profiles;
    this.logger = options.logger.child({ module: 'orchestrator' });
    this.enforcer = new PolicyEnforcer(this.registry);
    this.defaults = {
      concurrencyLimit: options.dispatch?.concurrencyLimit ?? 3,
      batchDeadlineMs: options.dispatch?.batchDeadlineMs,
    };

    const executor = new InvocationExecutor({
      agentExecutor: options.agentExecutor,
      enforcer: this.enforcer,
      toolProvider: options.toolProvider,
      logger: options.logger,
    });
    this.dispatcher = new Dispatcher({ profiles: this.profiles, executor, logger: options.logger });
  }

  /**
   * Run a batch and aggregate it. Individual invocation failures come back
   * as abstentions; only a malformed batch throws.
   */
  async submitBatch(
    requests: readonly InvocationRequest[],
    options: SubmitBatchOptions = {}
  ): Promise<BatchReport> {
    const batchId = nanoid();
    const observer = composeObservers([createLoggingObserver(this.logger), options.observer], this.logger);

    const outcomes = await this.dispatcher.runBatch(
      requests,
      options.concurrencyLimit ?? this.defaults.concurrencyLimit,
      {
        batchId,
        batchDeadlineMs: options.batchDeadlineMs ?? this.defaults.batchDeadlineMs,
        observer,
      }
    );
    const signal = aggregate(outcomes);

    this.logger.info(
      {
        batchId,
        finalSentiment: signal.finalSentiment,
        aggregateConfidence: Number(signal.aggregateConfidence.toFixed(4)),
        contributions: signal.contributions.length,
        abstentions: signal.abstentions.length,
      },
      'Composite signal ready'
    );

    return { batchId, signal, outcomes };
  }
}

export interface CreateOrchestratorOptions {
  config: Config;
  logger: Logger;
  agentExecutor: AgentExecutor;
  toolProvider?: ToolProvider;
}

/**
 * Load tool and profile definitions named by the config and wire the engine.
 * Configuration errors (unknown tool, invalid profile) are thrown here.
 */
export function createOrchestrator(options: CreateOrchestratorOptions): Orchestrator {
  const { toolsPath, profilesPath } = resolveDefinitionPaths(options.config.definitions);
  const registry = loadToolRegistry(toolsPath);
  const profiles = loadProfileStore(profilesPath, registry);

  options.logger.info(
    { tools: registry.size, profiles: profiles.list().length, toolsPath, profilesPath },
    'Definitions loaded'
  );

  return new Orchestrator({
    registry,
    profiles,
    agentExecutor: options.agentExecutor,
    toolProvider: options.toolProvider,
    logger: options.logger,
    dispatch: options.config.dispatch,
  });
}
