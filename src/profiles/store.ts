/**
 * AgentProfileStore: immutable set of subagent profiles, validated against
 * the tool registry when loaded.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ProfileValidationError, UnknownAgentError, UnknownToolError } from '../errors.js';
import { PolicyEnforcer } from '../policy/enforcer.js';
import { isWildcard } from '../policy/tool-policy.js';
import { normalizeToolName, type ToolRegistry } from '../tools/registry.js';
import { CAPABILITY_TAGS, type CapabilityTag } from '../tools/types.js';
import { errorMessage } from '../utils/error-message.js';
import { MAX_TIMER_MS } from '../utils/timer.js';
import { BASE_RESULT_KEYS, type AgentProfile } from './types.js';

const profileDefinitionSchema = z.object({
  name: z.string().min(1, 'Agent name is required'),
  description: z.string().default(''),
  systemPrompt: z.string().default(''),
  allowedToolPatterns: z.array(z.string().min(1)),
  // Capabilities are checked against the registry below, not the enum, so
  // the error names the offending tag
  deniedCapabilities: z.array(z.string()).default([]),
  maxDurationMs: z.number().int().positive().max(MAX_TIMER_MS),
  maxContextTokens: z.number().int().positive(),
  outputSchema: z
    .object({ required: z.array(z.string().min(1)) })
    .default({ required: [...BASE_RESULT_KEYS] }),
});

const profileFileSchema = z.object({
  profiles: z.array(profileDefinitionSchema),
});

export type AgentProfileDefinition = z.input<typeof profileDefinitionSchema>;

export class AgentProfileStore {
  private profiles: Map<string, AgentProfile> = new Map();

  constructor(profiles: AgentProfile[]) {
    for (const profile of profiles) {
      this.profiles.set(profile.name, profile);
    }
  }

  /**
   * @throws UnknownAgentError if no profile has this name
   */
  getProfile(agentName: string): AgentProfile {
    const profile = this.profiles.get(agentName);
    if (!profile) {
      throw new UnknownAgentError(agentName);
    }
    return profile;
  }

  has(agentName: string): boolean {
    return this.profiles.has(agentName);
  }

  list(): AgentProfile[] {
    return Array.from(this.profiles.values());
  }
}

/**
 * Set that refuses changes once constructed.
 */
class FrozenSet<T> extends Set<T> {
  constructor(values: Iterable<T>) {
    super(values);
    Object.freeze(this);
  }

  add(value: T): this {
    if (Object.isFrozen(this)) {
      throw new TypeError('Cannot add to a frozen set');
    }
    return super.add(value);
  }

  delete(_value: T): boolean {
    throw new TypeError('Cannot delete from a frozen set');
  }

  clear(): void {
    throw new TypeError('Cannot clear a frozen set');
  }
}

function isCapabilityTag(value: string): value is CapabilityTag {
  return CAPABILITY_TAGS.some((tag) => tag === value);
}

/**
 * Validate raw profile definitions and build the store.
 *
 * @throws ProfileValidationError on a malformed or unusable profile
 * @throws UnknownToolError when an exact (non-wildcard) pattern names no registered tool
 */
export function buildProfileStore(raw: unknown, registry: ToolRegistry): AgentProfileStore {
  const result = profileFileSchema.safeParse(raw);
  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new ProfileValidationError(`Profile validation failed:\n${errorMessages}`);
  }

  const enforcer = new PolicyEnforcer(registry);
  const known = registry.capabilities();
  const seen = new Set<string>();
  const profiles: AgentProfile[] = [];

  for (const def of result.data.profiles) {
    if (seen.has(def.name)) {
      throw new ProfileValidationError('duplicate profile name', def.name);
    }
    seen.add(def.name);

    if (def.allowedToolPatterns.length === 0) {
      throw new ProfileValidationError('allowedToolPatterns must not be empty', def.name);
    }

    const denied: CapabilityTag[] = [];
    for (const tag of def.deniedCapabilities) {
      if (!isCapabilityTag(tag) || !known.has(tag)) {
        throw new ProfileValidationError(`unknown capability in deniedCapabilities: "${tag}"`, def.name);
      }
      denied.push(tag);
    }

    // Patterns are matched against bare tool names, so strip MCP prefixes here too
    const patterns = def.allowedToolPatterns.map(normalizeToolName);
    for (const pattern of patterns) {
      if (!isWildcard(pattern) && !registry.has(pattern)) {
        throw new UnknownToolError(pattern);
      }
    }

    const required = [...new Set([...BASE_RESULT_KEYS, ...def.outputSchema.required])];

    const profile: AgentProfile = Object.freeze({
      name: def.name,
      description: def.description,
      systemPrompt: def.systemPrompt,
      allowedToolPatterns: Object.freeze(patterns),
      deniedCapabilities: new FrozenSet(denied),
      maxDurationMs: def.maxDurationMs,
      maxContextTokens: def.maxContextTokens,
      outputSchema: Object.freeze({ required: Object.freeze(required) }),
    });

    if (enforcer.usableTools(profile).length === 0) {
      throw new ProfileValidationError('no registered tool is usable under this profile', def.name);
    }

    profiles.push(profile);
  }

  return new AgentProfileStore(profiles);
}

export function loadProfileStore(filePath: string, registry: ToolRegistry): AgentProfileStore {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ProfileValidationError(
      `Failed to read profile definitions from ${filePath}: ${errorMessage(error)}`,
      undefined,
      error
    );
  }
  return buildProfileStore(raw, registry);
}
