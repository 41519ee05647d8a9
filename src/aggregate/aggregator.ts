/**
 * Confidence-weighted vote over a batch's successful outcomes.
 *
 * Weight per sentiment = sum of the confidences voting for it. The heaviest
 * sentiment wins; ties go to the more cautious sentiment
 * (neutral > bearish > bullish). Everything that did not succeed is an
 * abstention and carries no weight.
 *
 * Pure: the same multiset of outcomes always yields the same signal.
 */

import type {
  InvocationOutcome,
  Sentiment,
  SuccessOutcome,
} from '../subagent/types.js';

/** Tie-break order, most cautious first */
export const SENTIMENT_PRECEDENCE: readonly Sentiment[] = ['neutral', 'bearish', 'bullish'];

const TIE_EPSILON = 1e-9;

export interface Contribution {
  readonly requestId: string;
  readonly agentName: string;
  readonly sentiment: Sentiment;
  readonly confidence: number;
}

export interface Abstention {
  readonly requestId: string;
  readonly agentName: string;
  readonly reason: string;
}

export interface CompositeSignal {
  readonly finalSentiment: Sentiment;
  readonly aggregateConfidence: number;
  readonly weights: Readonly<Record<Sentiment, number>>;
  readonly contributions: readonly Contribution[];
  readonly abstentions: readonly Abstention[];
}

/**
 * Human-readable reason an outcome produced no vote.
 */
export function describeOutcome(outcome: InvocationOutcome): string {
  switch (outcome.status) {
    case 'success':
      return `${outcome.result.sentiment} (${outcome.result.confidence})`;
    case 'timeout':
      return outcome.reason === 'batch-deadline'
        ? 'timed out (batch deadline)'
        : `timed out after ${outcome.durationMs}ms (agent deadline)`;
    case 'policy-violation':
      return `policy violation: ${outcome.toolName} (${outcome.reason})`;
    case 'executor-error':
      return `executor error: ${outcome.message}`;
  }
}

function byAgentThenRequest(
  a: { agentName: string; requestId: string },
  b: { agentName: string; requestId: string }
): number {
  if (a.agentName !== b.agentName) return a.agentName < b.agentName ? -1 : 1;
  if (a.requestId !== b.requestId) return a.requestId < b.requestId ? -1 : 1;
  return 0;
}

export function aggregate(outcomes: readonly InvocationOutcome[]): CompositeSignal {
  const successes = outcomes
    .filter((o): o is SuccessOutcome => o.status === 'success')
    .sort(byAgentThenRequest);

  const contributions: Contribution[] = successes.map((o) => ({
    requestId: o.requestId,
    agentName: o.agentName,
    sentiment: o.result.sentiment,
    confidence: o.result.confidence,
  }));

  const abstentions: Abstention[] = outcomes
    .filter((o) => o.status !== 'success')
    .map((o) => ({ requestId: o.requestId, agentName: o.agentName, reason: describeOutcome(o) }))
    .sort(byAgentThenRequest);

  // Summed in canonical order so floating-point results do not depend on
  // completion order
  const weights: Record<Sentiment, number> = { bullish: 0, bearish: 0, neutral: 0 };
  for (const c of contributions) {
    weights[c.sentiment] += c.confidence;
  }
  const total = weights.bullish + weights.bearish + weights.neutral;

  if (total <= 0) {
    return {
      finalSentiment: 'neutral',
      aggregateConfidence: 0,
      weights,
      contributions,
      abstentions,
    };
  }

  let winner: Sentiment = SENTIMENT_PRECEDENCE[0];
  for (const sentiment of SENTIMENT_PRECEDENCE) {
    if (weights[sentiment] > weights[winner] + TIE_EPSILON) {
      winner = sentiment;
    }
  }

  return {
    finalSentiment: winner,
    aggregateConfidence: Math.min(1, weights[winner] / total),
    weights,
    contributions,
    abstentions,
  };
}
