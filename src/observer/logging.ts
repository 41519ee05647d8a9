import type { Logger } from 'pino';
import type { DispatchObserver } from './types.js';

/**
 * Observer that writes each dispatch event to the log.
 */
export function createLoggingObserver(logger: Logger): DispatchObserver {
  const log = logger.child({ module: 'dispatch-log' });

  return {
    onBatchStart({ batchId, requests, concurrencyLimit }) {
      log.debug({ batchId, requests: requests.length, concurrencyLimit }, 'Batch start');
    },
    onInvocationStart(request) {
      log.debug({ requestId: request.requestId, agent: request.agentName }, 'Invocation start');
    },
    onToolCall(request, decision) {
      if (decision.allowed) {
        log.trace({ requestId: request.requestId, tool: decision.toolName }, 'Tool call allowed');
      } else {
        log.debug(
          { requestId: request.requestId, tool: decision.toolName, reason: decision.reason },
          'Tool call denied'
        );
      }
    },
    onInvocationEnd(outcome) {
      log.debug({ requestId: outcome.requestId, agent: outcome.agentName, status: outcome.status }, 'Invocation end');
    },
    onBatchEnd({ batchId, outcomes, durationMs }) {
      log.debug({ batchId, outcomes: outcomes.length, durationMs }, 'Batch end');
    },
  };
}
