/**
 * Dispatcher: runs a batch of invocation requests on a bounded worker pool.
 *
 * - At most `concurrencyLimit` invocations run at once; a freed slot picks
 *   up the next queued request immediately
 * - Every requestId comes back exactly once, in completion order
 * - A failed or timed-out invocation never affects its siblings
 * - An optional batch deadline cancels running invocations and turns every
 *   unfinished request into a timeout, keeping outcomes already settled
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { InvalidBatchError } from '../errors.js';
import { composeObservers } from '../observer/compose.js';
import type { DispatchObserver } from '../observer/types.js';
import type { AgentProfileStore } from '../profiles/store.js';
import { errorMessage } from '../utils/error-message.js';
import { MAX_TIMER_MS } from '../utils/timer.js';
import type { InvocationExecutor } from './executor.js';
import { InvocationRegistry } from './registry.js';
import type { InvocationOutcome, InvocationRequest } from './types.js';

export interface DispatcherOptions {
  profiles: AgentProfileStore;
  executor: InvocationExecutor;
  logger: Logger;
}

export interface RunBatchOptions {
  /** Ceiling for the whole batch, measured from the call */
  batchDeadlineMs?: number;
  /** Per-batch observer; replaces process-wide counters */
  observer?: DispatchObserver;
  batchId?: string;
}

export class Dispatcher {
  private profiles: AgentProfileStore;
  private executor: InvocationExecutor;
  private logger: Logger;

  constructor(options: DispatcherOptions) {
    this.profiles = options.profiles;
    this.executor = options.executor;
    this.logger = options.logger.child({ module: 'dispatcher' });
  }

  /**
   * Run every request to a terminal outcome.
   *
   * @throws InvalidBatchError for a duplicate requestId or a non-positive limit;
   *   nothing runs in that case
   */
  async runBatch(
    requests: readonly InvocationRequest[],
    concurrencyLimit: number,
    options: RunBatchOptions = {}
  ): Promise<InvocationOutcome[]> {
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new InvalidBatchError(`concurrencyLimit must be a positive integer, got ${concurrencyLimit}`);
    }
    const requested = options.batchDeadlineMs;
    if (requested !== undefined && !(requested >= 0)) {
      throw new InvalidBatchError(`batchDeadlineMs must be non-negative, got ${requested}`);
    }
    if (requested !== undefined && requested !== Infinity && requested > MAX_TIMER_MS) {
      throw new InvalidBatchError(`batchDeadlineMs must not exceed ${MAX_TIMER_MS}, got ${requested}`);
    }
    // Infinity means no ceiling
    const batchDeadlineMs = requested === Infinity ? undefined : requested;

    const batchId = options.batchId ?? nanoid();
    const log = this.logger.child({ batchId });
    const ledger = new InvocationRegistry(requests, log);
    const observer = composeObservers([options.observer], log);
    const startedAt = Date.now();

    const controller = new AbortController();
    const deadline = batchDeadlineMs === undefined ? Infinity : startedAt + batchDeadlineMs;
    const timer =
      batchDeadlineMs === undefined
        ? undefined
        : setTimeout(() => {
            log.warn(
              { batchDeadlineMs, unsettled: ledger.unsettled().length },
              'Batch deadline reached; cancelling pending invocations'
            );
            controller.abort();
          }, batchDeadlineMs);

    observer.onBatchStart({ batchId, requests, concurrencyLimit });
    log.info({ requests: requests.length, concurrencyLimit, batchDeadlineMs }, 'Batch started');

    const queue = [...requests];
    const worker = async (): Promise<void> => {
      for (let next = queue.shift(); next; next = queue.shift()) {
        if (controller.signal.aborted) return;
        await this.runOne(next, ledger, deadline, controller.signal, observer);
      }
    };

    try {
      const poolSize = Math.min(concurrencyLimit, requests.length);
      await Promise.all(Array.from({ length: poolSize }, () => worker()));
    } finally {
      if (timer) clearTimeout(timer);
    }

    // Requests still queued when the deadline fired never started
    for (const request of ledger.unsettled()) {
      const outcome: InvocationOutcome = controller.signal.aborted
        ? {
            status: 'timeout',
            requestId: request.requestId,
            agentName: request.agentName,
            reason: 'batch-deadline',
            durationMs: 0,
          }
        : {
            status: 'executor-error',
            requestId: request.requestId,
            agentName: request.agentName,
            message: 'Request was never dispatched',
          };
      if (ledger.settle(Object.freeze(outcome))) {
        observer.onInvocationEnd(outcome);
      }
    }

    const outcomes = ledger.outcomes();
    const durationMs = Date.now() - startedAt;
    observer.onBatchEnd({ batchId, outcomes, durationMs });
    log.info(
      {
        durationMs,
        succeeded: outcomes.filter((o) => o.status === 'success').length,
        failed: outcomes.filter((o) => o.status !== 'success').length,
      },
      'Batch completed'
    );
    return outcomes;
  }

  private async runOne(
    request: InvocationRequest,
    ledger: InvocationRegistry,
    deadline: number,
    signal: AbortSignal,
    observer: Required<DispatchObserver>
  ): Promise<void> {
    ledger.markRunning(request.requestId);
    observer.onInvocationStart(request);

    let outcome: InvocationOutcome;
    if (!this.profiles.has(request.agentName)) {
      outcome = Object.freeze({
        status: 'executor-error',
        requestId: request.requestId,
        agentName: request.agentName,
        message: `Unknown agent: ${request.agentName}`,
      });
    } else {
      try {
        const profile = this.profiles.getProfile(request.agentName);
        outcome = await this.executor.run(request, profile, deadline, { signal, observer });
      } catch (error) {
        outcome = Object.freeze({
          status: 'executor-error',
          requestId: request.requestId,
          agentName: request.agentName,
          message: errorMessage(error),
        });
      }
    }

    if (ledger.settle(outcome)) {
      observer.onInvocationEnd(outcome);
    }
  }
}
