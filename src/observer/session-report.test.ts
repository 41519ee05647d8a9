import { describe, it, expect } from 'vitest';
import { aggregate } from '../aggregate/aggregator.js';
import { ActivityTracker } from './activity-tracker.js';
import { formatDuration, renderSessionReport } from './session-report.js';

const T0 = Date.UTC(2023, 10, 14, 22, 13, 20);

describe('formatDuration', () => {
  it('uses milliseconds below one second', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('uses seconds with one decimal from one second', () => {
    expect(formatDuration(1000)).toBe('1.0s');
    expect(formatDuration(1540)).toBe('1.5s');
  });
});

describe('renderSessionReport', () => {
  it('renders an empty session', () => {
    const tracker = new ActivityTracker({ sessionId: 's1', now: () => T0 });

    expect(renderSessionReport(tracker)).toBe(
      [
        '# Agent Council Session Report',
        '',
        '## Session Overview',
        '',
        '- **Session ID**: `s1`',
        '- **Started**: 2023-11-14T22:13:20.000Z',
        '- **Duration**: 0ms',
        '- **Batches**: 0',
        '- **Invocations**: 0',
        '- **Tool Calls**: 0 (0 denied)',
        '- **Unique Agents**: 0',
        '',
        '## Agent Summary',
        '',
        '*No invocations recorded*',
        '',
        '## Tool Statistics',
        '',
        '*No tool calls recorded*',
        '',
      ].join('\n')
    );
  });

  it('renders agents, tools and the composite signal', () => {
    let now = T0;
    const tracker = new ActivityTracker({ sessionId: 's2', now: () => now });
    const news = { requestId: 'r1', agentName: 'news-analyst', taskPrompt: 'news', submittedAt: T0 };
    const risk = { requestId: 'r2', agentName: 'risk-manager', taskPrompt: 'risk', submittedAt: T0 };

    tracker.onBatchStart({ batchId: 'b1', requests: [news, risk], concurrencyLimit: 2 });
    tracker.onInvocationStart(news);
    tracker.onInvocationStart(risk);
    tracker.onToolCall(news, { allowed: true, toolName: 'polygon_news', capability: 'read-market-data' });
    tracker.onToolCall(risk, { allowed: true, toolName: 'binance_get_account', capability: 'read-account' });
    tracker.onToolCall(risk, { allowed: true, toolName: 'binance_get_account', capability: 'read-account' });
    now = T0 + 400;
    const outcomes = [
      {
        status: 'success' as const,
        requestId: 'r1',
        agentName: 'news-analyst',
        durationMs: 400,
        result: { sentiment: 'bullish' as const, confidence: 0.8, summary: 'ok', factors: [], raw: {} },
      },
      {
        status: 'executor-error' as const,
        requestId: 'r2',
        agentName: 'risk-manager',
        message: 'crashed',
      },
    ];
    for (const outcome of outcomes) tracker.onInvocationEnd(outcome);
    now = T0 + 1500;
    tracker.onBatchEnd({ batchId: 'b1', outcomes, durationMs: 1500 });

    const report = renderSessionReport(tracker, aggregate(outcomes));
    const lines = report.split('\n');

    expect(lines).toContain('- **Duration**: 1.5s');
    expect(lines).toContain('- **Tool Calls**: 3 (0 denied)');
    expect(lines).toContain('- **Final Sentiment**: bullish');
    expect(lines).toContain('- **Aggregate Confidence**: 1.000');
    expect(lines).toContain('| news-analyst | bullish | 0.80 |');
    expect(lines).toContain('- risk-manager: executor error: crashed');
    expect(lines).toContain('| news-analyst | 1 | 400ms | success: 1 | 1 | 0 |');
    expect(lines).toContain('| risk-manager | 1 | 400ms | executor-error: 1 | 2 | 0 |');

    const toolRows = lines.filter((line) => line.startsWith('| binance_') || line.startsWith('| polygon_'));
    expect(toolRows).toEqual(['| binance_get_account | 2 |', '| polygon_news | 1 |']);
    expect(report.indexOf('## Composite Signal')).toBeLessThan(report.indexOf('## Agent Summary'));
  });
});
