import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import type { InvocationRequest } from '../subagent/types.js';
import { composeObservers } from './compose.js';
import type { DispatchObserver } from './types.js';

const logger = pino({ level: 'silent' });

const request: InvocationRequest = { requestId: 'r1', agentName: 'news-analyst', taskPrompt: 't', submittedAt: 0 };

describe('composeObservers', () => {
  it('fans each hook out to every observer', () => {
    const first = { onInvocationStart: vi.fn() };
    const second = { onInvocationStart: vi.fn(), onBatchEnd: vi.fn() };

    const composed = composeObservers([first, undefined, second], logger);
    composed.onInvocationStart(request);
    composed.onBatchEnd({ batchId: 'b', outcomes: [], durationMs: 1 });

    expect(first.onInvocationStart).toHaveBeenCalledWith(request);
    expect(second.onInvocationStart).toHaveBeenCalledWith(request);
    expect(second.onBatchEnd).toHaveBeenCalledTimes(1);
  });

  it('contains a throwing hook', () => {
    const broken: DispatchObserver = {
      onInvocationStart: () => {
        throw new Error('broken');
      },
    };
    const healthy = { onInvocationStart: vi.fn() };

    const composed = composeObservers([broken, healthy], logger);

    expect(() => composed.onInvocationStart(request)).not.toThrow();
    expect(healthy.onInvocationStart).toHaveBeenCalledTimes(1);
  });

  it('tolerates no observers at all', () => {
    const composed = composeObservers([], logger);
    expect(() => composed.onBatchStart({ batchId: 'b', requests: [], concurrencyLimit: 1 })).not.toThrow();
  });
});
