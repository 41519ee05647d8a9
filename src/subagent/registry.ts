/**
 * InvocationRegistry: per-batch ledger of requests and their outcomes.
 *
 * Settles each requestId exactly once, which is what guarantees the batch
 * returns one outcome per submitted request.
 */

import type { Logger } from 'pino';
import { InvalidBatchError } from '../errors.js';
import type { InvocationOutcome, InvocationRequest } from './types.js';

export type InvocationState = 'queued' | 'running' | 'settled';

interface Entry {
  request: InvocationRequest;
  state: InvocationState;
  outcome?: InvocationOutcome;
}

export class InvocationRegistry {
  private entries: Map<string, Entry> = new Map();
  private settledOrder: InvocationOutcome[] = [];
  private running = 0;
  private logger: Logger;

  /**
   * @throws InvalidBatchError on a duplicate requestId
   */
  constructor(requests: readonly InvocationRequest[], logger: Logger) {
    this.logger = logger;
    for (const request of requests) {
      if (this.entries.has(request.requestId)) {
        throw new InvalidBatchError(`Duplicate requestId in batch: ${request.requestId}`);
      }
      this.entries.set(request.requestId, { request, state: 'queued' });
    }
  }

  markRunning(requestId: string): void {
    const entry = this.entries.get(requestId);
    if (!entry || entry.state !== 'queued') return;
    entry.state = 'running';
    this.running++;
  }

  /**
   * Record the terminal outcome for a request.
   * @returns false when the request was already settled (the outcome is dropped)
   */
  settle(outcome: InvocationOutcome): boolean {
    const entry = this.entries.get(outcome.requestId);
    if (!entry) {
      this.logger.warn({ requestId: outcome.requestId }, 'Outcome for unknown request ignored');
      return false;
    }
    if (entry.state === 'settled') {
      this.logger.debug(
        { requestId: outcome.requestId, status: outcome.status, kept: entry.outcome?.status },
        'Duplicate outcome discarded'
      );
      return false;
    }

    if (entry.state === 'running') this.running--;
    entry.state = 'settled';
    entry.outcome = outcome;
    this.settledOrder.push(outcome);
    return true;
  }

  getState(requestId: string): InvocationState | undefined {
    return this.entries.get(requestId)?.state;
  }

  /** Requests without an outcome yet, in submission order */
  unsettled(): InvocationRequest[] {
    return Array.from(this.entries.values())
      .filter((entry) => entry.state !== 'settled')
      .map((entry) => entry.request);
  }

  get runningCount(): number {
    return this.running;
  }

  get size(): number {
    return this.entries.size;
  }

  isComplete(): boolean {
    return this.settledOrder.length === this.entries.size;
  }

  /** Outcomes in the order they settled */
  outcomes(): InvocationOutcome[] {
    return [...this.settledOrder];
  }
}
