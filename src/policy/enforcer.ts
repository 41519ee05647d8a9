/**
 * Policy Enforcer
 *
 * Decides, for one attempted tool call, whether an agent may use the tool.
 * Evaluated on every call during an invocation, since an agent's tool choices
 * are only known at run time.
 *
 * Order of evaluation:
 *   1. unknown tool           → deny
 *   2. denied capability      → deny (wins over any allow pattern)
 *   3. matches allow pattern  → allow
 *   4. otherwise              → deny
 */

import type { AgentProfile } from '../profiles/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { normalizeToolName } from '../tools/registry.js';
import type { CapabilityTag, ToolDefinition } from '../tools/types.js';
import { matchesAnyPattern } from './tool-policy.js';

export type AuthorizationDecision =
  | { allowed: true; toolName: string; capability: CapabilityTag }
  | { allowed: false; toolName: string; reason: string; capability?: CapabilityTag };

export const DENY_REASONS = {
  unknownTool: 'unknown tool',
  notAllowListed: 'not in allow-list',
  deniedCapability: (capability: CapabilityTag) => `capability "${capability}" denied for this agent`,
} as const;

export class PolicyEnforcer {
  constructor(private readonly registry: ToolRegistry) {}

  authorize(profile: AgentProfile, requestedName: string): AuthorizationDecision {
    const toolName = normalizeToolName(requestedName);
    const tool = this.registry.get(toolName);
    if (!tool) {
      return { allowed: false, toolName, reason: DENY_REASONS.unknownTool };
    }

    const { capability } = tool;
    if (profile.deniedCapabilities.has(capability)) {
      return { allowed: false, toolName, capability, reason: DENY_REASONS.deniedCapability(capability) };
    }

    if (matchesAnyPattern(toolName, profile.allowedToolPatterns)) {
      return { allowed: true, toolName, capability };
    }

    return { allowed: false, toolName, capability, reason: DENY_REASONS.notAllowListed };
  }

  /**
   * Registered tools the profile is allowed to call.
   */
  usableTools(profile: AgentProfile): ToolDefinition[] {
    return this.registry.list().filter((tool) => this.authorize(profile, tool.name).allowed);
  }
}
