/**
 * Recorded batch files for `agent-council replay`.
 *
 * {
 *   "concurrencyLimit": 2,
 *   "batchDeadlineMs": 5000,
 *   "tools": { "polygon_news": [...] },
 *   "requests": [{ "agent": "news-analyst", "task": "...", "script": { ... } }]
 * }
 */

import * as fs from 'fs';
import { z } from 'zod';
import { CouncilError } from '../errors.js';
import { createRequest } from '../subagent/request.js';
import type { InvocationRequest } from '../subagent/types.js';
import { errorMessage } from '../utils/error-message.js';
import { ReplayExecutor, StaticToolProvider, replayScriptSchema } from './replay.js';

const replayFileSchema = z.object({
  concurrencyLimit: z.number().int().positive().optional(),
  batchDeadlineMs: z.number().int().positive().optional(),
  tools: z.record(z.unknown()).default({}),
  requests: z
    .array(
      z.object({
        agent: z.string().min(1),
        task: z.string().min(1),
        script: replayScriptSchema,
      })
    )
    .min(1, 'At least one request is required'),
});

export interface ReplayBatch {
  requests: InvocationRequest[];
  executor: ReplayExecutor;
  toolProvider: StaticToolProvider;
  concurrencyLimit?: number;
  batchDeadlineMs?: number;
}

export function parseReplayBatch(raw: unknown): ReplayBatch {
  const result = replayFileSchema.safeParse(raw);
  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new CouncilError(`Invalid replay file:\n${errorMessages}`);
  }

  const executor = new ReplayExecutor();
  const requests: InvocationRequest[] = [];
  for (const entry of result.data.requests) {
    if (requests.some((r) => r.taskPrompt === entry.task)) {
      throw new CouncilError(`Replay tasks must be unique: "${entry.task}"`);
    }
    executor.record(entry.task, entry.script);
    requests.push(createRequest(entry.agent, entry.task));
  }

  return {
    requests,
    executor,
    toolProvider: new StaticToolProvider(result.data.tools),
    concurrencyLimit: result.data.concurrencyLimit,
    batchDeadlineMs: result.data.batchDeadlineMs,
  };
}

export function loadReplayBatch(filePath: string): ReplayBatch {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CouncilError(`Failed to read replay file ${filePath}: ${errorMessage(error)}`, error);
  }
  return parseReplayBatch(raw);
}
