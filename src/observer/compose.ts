import type { Logger } from 'pino';
import { errorMessage } from '../utils/error-message.js';
import type { DispatchObserver } from './types.js';

/**
 * Fan hooks out to several observers. A hook that throws is logged and
 * skipped; it never reaches the dispatcher.
 */
export function composeObservers(
  observers: ReadonlyArray<DispatchObserver | undefined>,
  logger: Logger
): Required<DispatchObserver> {
  const active = observers.filter((o): o is DispatchObserver => o !== undefined);
  const log = logger.child({ module: 'dispatch-observer' });

  function each(hook: keyof DispatchObserver, invoke: (observer: DispatchObserver) => void): void {
    for (const observer of active) {
      try {
        invoke(observer);
      } catch (error) {
        log.warn({ hook, error: errorMessage(error) }, 'Observer hook threw');
      }
    }
  }

  return {
    onBatchStart: (event) => each('onBatchStart', (o) => o.onBatchStart?.(event)),
    onInvocationStart: (request) => each('onInvocationStart', (o) => o.onInvocationStart?.(request)),
    onToolCall: (request, decision) => each('onToolCall', (o) => o.onToolCall?.(request, decision)),
    onInvocationEnd: (outcome) => each('onInvocationEnd', (o) => o.onInvocationEnd?.(outcome)),
    onBatchEnd: (event) => each('onBatchEnd', (o) => o.onBatchEnd?.(event)),
  };
}
