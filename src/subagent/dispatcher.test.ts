import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { InvalidBatchError } from '../errors.js';
import type { DispatchObserver } from '../observer/types.js';
import { PolicyEnforcer } from '../policy/enforcer.js';
import { buildProfileStore } from '../profiles/store.js';
import { ToolRegistry } from '../tools/registry.js';
import { Dispatcher } from './dispatcher.js';
import { InvocationExecutor } from './executor.js';
import type { AgentExecutor, ExecutorCall, InvocationRequest } from './types.js';

const logger = pino({ level: 'silent' });

const registry = new ToolRegistry([
  { name: 'polygon_news', capability: 'read-market-data' },
  { name: 'binance_get_account', capability: 'read-account' },
]);

const profiles = buildProfileStore(
  {
    profiles: [
      { name: 'news-analyst', allowedToolPatterns: ['polygon_*'], maxDurationMs: 2000, maxContextTokens: 1000 },
      { name: 'risk-manager', allowedToolPatterns: ['binance_*'], maxDurationMs: 2000, maxContextTokens: 1000 },
      { name: 'slow-analyst', allowedToolPatterns: ['polygon_*'], maxDurationMs: 40, maxContextTokens: 1000 },
    ],
  },
  registry
);

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type Behaviour = (call: ExecutorCall) => Promise<unknown>;

function createDispatcher(behaviours: Record<string, Behaviour>) {
  const agentExecutor: AgentExecutor = {
    execute(call) {
      const behaviour = behaviours[call.taskPrompt];
      if (!behaviour) throw new Error(`no behaviour for ${call.taskPrompt}`);
      return behaviour(call);
    },
  };
  const executor = new InvocationExecutor({
    agentExecutor,
    enforcer: new PolicyEnforcer(registry),
    toolProvider: { invoke: async () => ({}) },
    logger,
  });
  return new Dispatcher({ profiles, executor, logger });
}

function request(requestId: string, agentName: string, taskPrompt: string): InvocationRequest {
  return { requestId, agentName, taskPrompt, submittedAt: Date.now() };
}

const result = (sentiment: string, confidence: number) => ({ sentiment, confidence, summary: `${sentiment} view` });

describe('Dispatcher', () => {
  it('returns exactly one outcome per request', async () => {
    const dispatcher = createDispatcher({
      ok: async () => result('bullish', 0.5),
      bad: async () => ({ sentiment: 'bullish' }),
      boom: async () => {
        throw new Error('crashed');
      },
    });
    const requests = [
      request('r1', 'news-analyst', 'ok'),
      request('r2', 'news-analyst', 'bad'),
      request('r3', 'risk-manager', 'boom'),
      request('r4', 'risk-manager', 'ok'),
    ];

    const outcomes = await dispatcher.runBatch(requests, 2);

    expect(outcomes).toHaveLength(4);
    expect(outcomes.map((o) => o.requestId).sort()).toEqual(['r1', 'r2', 'r3', 'r4']);
    const byId = new Map(outcomes.map((o) => [o.requestId, o.status]));
    expect(byId.get('r1')).toBe('success');
    expect(byId.get('r2')).toBe('executor-error');
    expect(byId.get('r3')).toBe('executor-error');
    expect(byId.get('r4')).toBe('success');
  });

  it('never runs more invocations than the limit', async () => {
    let active = 0;
    let peak = 0;
    const dispatcher = createDispatcher({
      work: async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(15);
        active--;
        return result('neutral', 0.5);
      },
    });
    const requests = Array.from({ length: 5 }, (_, i) => request(`r${i}`, 'news-analyst', 'work'));

    const outcomes = await dispatcher.runBatch(requests, 2);

    expect(outcomes).toHaveLength(5);
    expect(peak).toBe(2);
    expect(outcomes.every((o) => o.status === 'success')).toBe(true);
  });

  it('runs one at a time with a limit of 1', async () => {
    const order: string[] = [];
    const dispatcher = createDispatcher({
      first: async () => {
        order.push('first:start');
        await sleep(10);
        order.push('first:end');
        return result('bullish', 0.5);
      },
      second: async () => {
        order.push('second:start');
        return result('bearish', 0.5);
      },
    });

    await dispatcher.runBatch(
      [request('a', 'news-analyst', 'first'), request('b', 'news-analyst', 'second')],
      1
    );

    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('returns outcomes in completion order', async () => {
    const dispatcher = createDispatcher({
      slow: async () => {
        await sleep(30);
        return result('bullish', 0.5);
      },
      fast: async () => result('bearish', 0.5),
    });

    const outcomes = await dispatcher.runBatch(
      [request('slow', 'news-analyst', 'slow'), request('fast', 'news-analyst', 'fast')],
      2
    );

    expect(outcomes.map((o) => o.requestId)).toEqual(['fast', 'slow']);
  });

  it('isolates a timed-out sibling', async () => {
    const dispatcher = createDispatcher({
      hang: () => new Promise(() => {}),
      ok: async () => result('bullish', 0.9),
    });

    const outcomes = await dispatcher.runBatch(
      [request('hung', 'slow-analyst', 'hang'), request('fine', 'news-analyst', 'ok')],
      2
    );

    const hung = outcomes.find((o) => o.requestId === 'hung');
    const fine = outcomes.find((o) => o.requestId === 'fine');
    expect(hung?.status === 'timeout' && hung.reason).toBe('agent-deadline');
    expect(fine?.status).toBe('success');
  });

  it('reports an unknown agent as an executor error', async () => {
    const dispatcher = createDispatcher({ ok: async () => result('bullish', 0.5) });

    const outcomes = await dispatcher.runBatch([request('r1', 'ghost', 'ok')], 1);

    expect(outcomes).toEqual([
      { status: 'executor-error', requestId: 'r1', agentName: 'ghost', message: 'Unknown agent: ghost' },
    ]);
  });

  it('returns an empty list for an empty batch', async () => {
    const dispatcher = createDispatcher({});
    await expect(dispatcher.runBatch([], 3)).resolves.toEqual([]);
  });

  describe('batch deadline', () => {
    it('keeps settled outcomes and times out the rest', async () => {
      const dispatcher = createDispatcher({
        quick: async () => result('bullish', 0.8),
        hang: () => new Promise(() => {}),
      });
      const requests = [
        request('done', 'news-analyst', 'quick'),
        request('hung', 'news-analyst', 'hang'),
        request('queued', 'news-analyst', 'quick'),
      ];

      const started = Date.now();
      const outcomes = await dispatcher.runBatch(requests, 1, { batchDeadlineMs: 50 });

      expect(Date.now() - started).toBeLessThan(1000);
      expect(outcomes).toHaveLength(3);
      const byId = new Map(outcomes.map((o) => [o.requestId, o]));
      expect(byId.get('done')?.status).toBe('success');
      const hung = byId.get('hung');
      expect(hung?.status === 'timeout' && hung.reason).toBe('batch-deadline');
      expect(byId.get('queued')).toEqual({
        status: 'timeout',
        requestId: 'queued',
        agentName: 'news-analyst',
        reason: 'batch-deadline',
        durationMs: 0,
      });
    });

    it('treats an infinite deadline as no ceiling', async () => {
      const dispatcher = createDispatcher({
        work: async () => {
          await sleep(30);
          return result('bullish', 0.5);
        },
      });

      const outcomes = await dispatcher.runBatch([request('r1', 'news-analyst', 'work')], 1, {
        batchDeadlineMs: Infinity,
      });

      expect(outcomes.map((o) => o.status)).toEqual(['success']);
    });

    it('rejects a deadline longer than a timer can hold', async () => {
      const execute = vi.fn(async () => result('bullish', 0.5));
      const dispatcher = createDispatcher({ work: execute });

      await expect(
        dispatcher.runBatch([request('r1', 'news-analyst', 'work')], 1, { batchDeadlineMs: 3_000_000_000 })
      ).rejects.toThrow('batchDeadlineMs must not exceed 2147483647, got 3000000000');
      expect(execute).not.toHaveBeenCalled();
    });

    it('accepts the longest timer delay', async () => {
      const dispatcher = createDispatcher({
        work: async () => {
          await sleep(30);
          return result('bearish', 0.5);
        },
      });

      const outcomes = await dispatcher.runBatch([request('r1', 'news-analyst', 'work')], 1, {
        batchDeadlineMs: 2_147_483_647,
      });

      expect(outcomes.map((o) => o.status)).toEqual(['success']);
    });

    it('times out everything when the deadline is zero', async () => {
      const dispatcher = createDispatcher({ hang: () => new Promise(() => {}) });

      const outcomes = await dispatcher.runBatch(
        [request('a', 'news-analyst', 'hang'), request('b', 'news-analyst', 'hang')],
        2,
        { batchDeadlineMs: 0 }
      );

      expect(outcomes.map((o) => o.status)).toEqual(['timeout', 'timeout']);
    });
  });

  describe('invalid batches', () => {
    it('rejects duplicate request ids before running anything', async () => {
      const execute = vi.fn(async () => result('bullish', 0.5));
      const dispatcher = createDispatcher({ ok: execute });

      await expect(
        dispatcher.runBatch([request('dup', 'news-analyst', 'ok'), request('dup', 'risk-manager', 'ok')], 2)
      ).rejects.toBeInstanceOf(InvalidBatchError);
      expect(execute).not.toHaveBeenCalled();
    });

    it('rejects a non-positive concurrency limit', async () => {
      const dispatcher = createDispatcher({});
      await expect(dispatcher.runBatch([], 0)).rejects.toThrow(
        'concurrencyLimit must be a positive integer, got 0'
      );
      await expect(dispatcher.runBatch([], 1.5)).rejects.toBeInstanceOf(InvalidBatchError);
    });

    it('rejects a negative batch deadline', async () => {
      const dispatcher = createDispatcher({});
      await expect(dispatcher.runBatch([], 1, { batchDeadlineMs: -1 })).rejects.toBeInstanceOf(InvalidBatchError);
    });
  });

  describe('observer', () => {
    it('receives batch, invocation and tool hooks', async () => {
      const dispatcher = createDispatcher({
        tools: async (call) => {
          await call.tools.call('polygon_news');
          await call.tools.call('binance_get_account');
          return result('bullish', 0.5);
        },
      });
      const observer = {
        onBatchStart: vi.fn(),
        onInvocationStart: vi.fn(),
        onToolCall: vi.fn(),
        onInvocationEnd: vi.fn(),
        onBatchEnd: vi.fn(),
      } satisfies DispatchObserver;

      const outcomes = await dispatcher.runBatch([request('r1', 'news-analyst', 'tools')], 1, {
        observer,
        batchId: 'batch-1',
      });

      expect(observer.onBatchStart).toHaveBeenCalledWith(
        expect.objectContaining({ batchId: 'batch-1', concurrencyLimit: 1 })
      );
      expect(observer.onInvocationStart).toHaveBeenCalledTimes(1);
      expect(observer.onToolCall).toHaveBeenCalledTimes(2);
      expect(observer.onToolCall.mock.calls[1][1]).toMatchObject({ allowed: false, toolName: 'binance_get_account' });
      expect(observer.onInvocationEnd).toHaveBeenCalledWith(outcomes[0]);
      expect(observer.onBatchEnd).toHaveBeenCalledWith(expect.objectContaining({ batchId: 'batch-1', outcomes }));
    });

    it('keeps running when an observer throws', async () => {
      const dispatcher = createDispatcher({ ok: async () => result('bullish', 0.5) });
      const observer: DispatchObserver = {
        onInvocationEnd: () => {
          throw new Error('observer bug');
        },
      };

      const outcomes = await dispatcher.runBatch([request('r1', 'news-analyst', 'ok')], 1, { observer });

      expect(outcomes[0].status).toBe('success');
    });
  });
});
