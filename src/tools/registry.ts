import * as fs from 'fs';
import { z } from 'zod';
import { UnknownToolError, CouncilError } from '../errors.js';
import { errorMessage } from '../utils/error-message.js';
import { CAPABILITY_TAGS, type CapabilityTag, type ToolDefinition } from './types.js';

/**
 * MCP clients expose tools as `mcp__<server>__<tool>`; profiles and the
 * catalogue use the bare tool name.
 */
const MCP_PREFIX = /^mcp__.+?__/;

export function normalizeToolName(name: string): string {
  return name.trim().replace(MCP_PREFIX, '');
}

const toolDefinitionSchema = z.object({
  name: z.string().min(1),
  capability: z.enum(CAPABILITY_TAGS),
  description: z.string().optional(),
});

const toolFileSchema = z.object({
  tools: z.array(toolDefinitionSchema),
});

/**
 * Static tool → capability catalogue. Read-only after construction.
 */
export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  constructor(definitions: ToolDefinition[]) {
    for (const def of definitions) {
      const name = normalizeToolName(def.name);
      if (this.tools.has(name)) {
        throw new CouncilError(`Duplicate tool definition: ${name}`);
      }
      this.tools.set(name, Object.freeze({ ...def, name }));
    }
  }

  /**
   * @throws UnknownToolError if the tool has no mapping
   */
  resolveCapability(toolName: string): CapabilityTag {
    const tool = this.tools.get(normalizeToolName(toolName));
    if (!tool) {
      throw new UnknownToolError(toolName);
    }
    return tool.capability;
  }

  has(toolName: string): boolean {
    return this.tools.has(normalizeToolName(toolName));
  }

  get(toolName: string): ToolDefinition | undefined {
    return this.tools.get(normalizeToolName(toolName));
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Every capability tag the engine understands, whether or not a tool
   * currently carries it.
   */
  capabilities(): ReadonlySet<CapabilityTag> {
    return new Set(CAPABILITY_TAGS);
  }
}

/**
 * Parse a tool catalogue from its JSON form.
 */
export function parseToolDefinitions(raw: unknown, source = 'tool definitions'): ToolDefinition[] {
  const result = toolFileSchema.safeParse(raw);
  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new CouncilError(`Invalid ${source}:\n${errorMessages}`);
  }
  return result.data.tools;
}

export function loadToolRegistry(filePath: string): ToolRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CouncilError(`Failed to read tool definitions from ${filePath}: ${errorMessage(error)}`, error);
  }
  return new ToolRegistry(parseToolDefinitions(raw, filePath));
}
