/**
 * Agent Profile Type Definitions
 *
 * Declarative definition of a subagent: what it may call, what it may never
 * call, how long it may run and what its result must contain.
 */

import type { CapabilityTag } from '../tools/types.js';

/** Keys every agent result carries regardless of profile */
export const BASE_RESULT_KEYS = ['sentiment', 'confidence', 'summary'] as const;

export interface OutputSchema {
  readonly required: readonly string[];
}

export interface AgentProfile {
  readonly name: string;
  readonly description: string;
  readonly systemPrompt: string;
  /** Glob-like patterns (`*` wildcard) matched against tool names */
  readonly allowedToolPatterns: readonly string[];
  /** Never usable, even where an allow pattern matches */
  readonly deniedCapabilities: ReadonlySet<CapabilityTag>;
  readonly maxDurationMs: number;
  readonly maxContextTokens: number;
  readonly outputSchema: OutputSchema;
}
