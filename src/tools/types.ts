/**
 * Tool catalogue types.
 */

export const CAPABILITY_TAGS = [
  'read-market-data',
  'read-account',
  'execute-trade',
  'research',
  'compute',
] as const;

/** Coarse classification of what a tool permits, used by policy decisions */
export type CapabilityTag = (typeof CAPABILITY_TAGS)[number];

export interface ToolDefinition {
  name: string;
  capability: CapabilityTag;
  description?: string;
}

/**
 * Backend reachable only through an invocation's tool gateway.
 * Provider-side failures are reported back to the calling agent as failed
 * tool calls.
 */
export interface ToolProvider {
  invoke(toolName: string, input: unknown, signal: AbortSignal): Promise<unknown>;
}
