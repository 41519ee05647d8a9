/**
 * Markdown report of a tracked session.
 */

import type { CompositeSignal } from '../aggregate/aggregator.js';
import type { InvocationStatus } from '../subagent/types.js';
import type { ActivityTracker, AgentStats } from './activity-tracker.js';

const STATUS_ORDER: InvocationStatus[] = ['success', 'timeout', 'policy-violation', 'executor-error'];

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatStatuses(statuses: AgentStats['statuses']): string {
  const parts = STATUS_ORDER.filter((s) => statuses[s]).map((s) => `${s}: ${statuses[s]}`);
  return parts.length > 0 ? parts.join(', ') : '-';
}

function overviewSection(tracker: ActivityTracker): string {
  const stats = tracker.getSessionStats();
  return [
    '## Session Overview',
    '',
    `- **Session ID**: \`${stats.sessionId}\``,
    `- **Started**: ${new Date(stats.startedAt).toISOString()}`,
    `- **Duration**: ${formatDuration(stats.durationMs)}`,
    `- **Batches**: ${stats.batches}`,
    `- **Invocations**: ${stats.invocations}`,
    `- **Tool Calls**: ${stats.toolCalls} (${stats.deniedToolCalls} denied)`,
    `- **Unique Agents**: ${stats.uniqueAgents}`,
  ].join('\n');
}

function signalSection(signal: CompositeSignal): string {
  const lines = [
    '## Composite Signal',
    '',
    `- **Final Sentiment**: ${signal.finalSentiment}`,
    `- **Aggregate Confidence**: ${signal.aggregateConfidence.toFixed(3)}`,
  ];

  if (signal.contributions.length > 0) {
    lines.push('', '| Agent | Sentiment | Confidence |', '|---|---|---|');
    for (const c of signal.contributions) {
      lines.push(`| ${c.agentName} | ${c.sentiment} | ${c.confidence.toFixed(2)} |`);
    }
  }

  if (signal.abstentions.length > 0) {
    lines.push('', '**Abstentions**', '');
    for (const a of signal.abstentions) {
      lines.push(`- ${a.agentName}: ${a.reason}`);
    }
  }
  return lines.join('\n');
}

function agentSection(tracker: ActivityTracker): string {
  const stats = tracker.getAgentStats();
  if (stats.length === 0) {
    return '## Agent Summary\n\n*No invocations recorded*';
  }
  const lines = [
    '## Agent Summary',
    '',
    '| Agent | Invocations | Avg Duration | Outcomes | Tool Calls | Denied |',
    '|---|---|---|---|---|---|',
  ];
  for (const s of stats) {
    lines.push(
      `| ${s.agentName} | ${s.invocations} | ${formatDuration(s.avgDurationMs)} | ${formatStatuses(s.statuses)} | ${s.toolCalls} | ${s.deniedToolCalls} |`
    );
  }
  return lines.join('\n');
}

function toolSection(tracker: ActivityTracker): string {
  const entries = Object.entries(tracker.getToolCounts()).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (entries.length === 0) {
    return '## Tool Statistics\n\n*No tool calls recorded*';
  }
  const lines = ['## Tool Statistics', '', '| Tool | Calls |', '|---|---|'];
  for (const [tool, count] of entries) {
    lines.push(`| ${tool} | ${count} |`);
  }
  return lines.join('\n');
}

export function renderSessionReport(tracker: ActivityTracker, signal?: CompositeSignal): string {
  const sections = ['# Agent Council Session Report', overviewSection(tracker)];
  if (signal) sections.push(signalSection(signal));
  sections.push(agentSection(tracker), toolSection(tracker));
  return sections.join('\n\n') + '\n';
}
