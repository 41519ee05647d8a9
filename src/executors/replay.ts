/**
 * Replay executor: plays back recorded agent behaviour instead of calling a
 * model. Scripts are keyed by task prompt, since that is all an invocation
 * exposes about the work it was given.
 */

import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import type { ToolProvider } from '../tools/types.js';
import type { AgentExecutor, ExecutorCall, ToolCallResult } from '../subagent/types.js';

const replayStepSchema = z.object({
  tool: z.string().min(1),
  input: z.unknown().optional(),
  /** Abort the invocation if this call fails */
  required: z.boolean().default(false),
});

export const replayScriptSchema = z.object({
  steps: z.array(replayStepSchema).default([]),
  delayMs: z.number().int().nonnegative().default(0),
  tokens: z.number().int().nonnegative().default(0),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

export type ReplayScript = z.infer<typeof replayScriptSchema>;
export type ReplayScriptInput = z.input<typeof replayScriptSchema>;

export class ReplayExecutor implements AgentExecutor {
  private scripts: Map<string, ReplayScript> = new Map();
  /** Tool results observed per task, in call order */
  readonly transcripts: Map<string, ToolCallResult[]> = new Map();

  constructor(scripts: Record<string, ReplayScriptInput> = {}) {
    for (const [task, script] of Object.entries(scripts)) {
      this.record(task, script);
    }
  }

  record(taskPrompt: string, script: ReplayScriptInput): void {
    this.scripts.set(taskPrompt, replayScriptSchema.parse(script));
  }

  async execute(call: ExecutorCall): Promise<unknown> {
    const script = this.scripts.get(call.taskPrompt);
    if (!script) {
      throw new Error(`No recorded behaviour for task: ${call.taskPrompt}`);
    }

    const transcript: ToolCallResult[] = [];
    this.transcripts.set(call.taskPrompt, transcript);

    for (const step of script.steps) {
      if (step.required) {
        const data = await call.tools.require(step.tool, step.input);
        transcript.push({ ok: true, toolName: step.tool, data });
      } else {
        transcript.push(await call.tools.call(step.tool, step.input));
      }
    }

    call.consumeTokens(script.tokens);

    if (script.delayMs > 0) {
      await delay(script.delayMs, undefined, { signal: call.signal });
    }
    if (script.error !== undefined) {
      throw new Error(script.error);
    }
    return script.result;
  }
}

/**
 * Tool provider answering from a fixed table of recorded responses.
 */
export class StaticToolProvider implements ToolProvider {
  private responses: Map<string, unknown>;

  constructor(responses: Record<string, unknown> = {}) {
    this.responses = new Map(Object.entries(responses));
  }

  async invoke(toolName: string): Promise<unknown> {
    if (!this.responses.has(toolName)) {
      throw new Error(`No recorded response for tool "${toolName}"`);
    }
    return this.responses.get(toolName);
  }
}
