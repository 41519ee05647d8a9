/**
 * Validation of the terminal payload an agent returns.
 *
 * Agents backed by a language model usually answer in text, so a string
 * payload is searched for a JSON object (a fenced ```json block first, then
 * the outermost braces).
 */

import { z } from 'zod';
import type { OutputSchema } from '../profiles/types.js';
import { errorMessage } from '../utils/error-message.js';
import { SENTIMENTS, type AgentResult } from './types.js';

const agentResultSchema = z.object({
  sentiment: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(SENTIMENTS)
  ),
  confidence: z.number().min(0).max(1),
  summary: z.string().min(1),
  factors: z.array(z.string()).default([]),
});

export type ParseAgentResult =
  | { ok: true; result: AgentResult }
  | { ok: false; error: string };

const FENCED_JSON = /```(?:json)?\s*\n?([\s\S]*?)```/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn a raw executor payload into a plain object, or undefined when no
 * object can be recovered.
 */
export function extractPayload(payload: unknown): Record<string, unknown> | undefined {
  if (isRecord(payload)) return payload;
  if (typeof payload !== 'string') return undefined;

  const candidates: string[] = [];
  const fenced = payload.match(FENCED_JSON);
  if (fenced) candidates.push(fenced[1]);
  const start = payload.indexOf('{');
  const end = payload.lastIndexOf('}');
  if (start !== -1 && end > start) candidates.push(payload.slice(start, end + 1));

  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (isRecord(parsed)) return parsed;
  }
  return undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function parseAgentResult(payload: unknown, schema: OutputSchema): ParseAgentResult {
  const record = extractPayload(payload);
  if (!record) {
    return { ok: false, error: 'payload is not a JSON object' };
  }

  const missing = schema.required.filter((key) => record[key] === undefined || record[key] === null);
  if (missing.length > 0) {
    return { ok: false, error: `missing required keys: ${missing.join(', ')}` };
  }

  const result = agentResultSchema.safeParse(record);
  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('; ');
    return { ok: false, error: errorMessages };
  }

  let raw: Record<string, unknown>;
  try {
    raw = deepFreeze(structuredClone(record));
  } catch (error) {
    return { ok: false, error: `payload is not plain data: ${errorMessage(error)}` };
  }

  return {
    ok: true,
    result: Object.freeze({
      sentiment: result.data.sentiment,
      confidence: result.data.confidence,
      summary: result.data.summary,
      factors: Object.freeze([...result.data.factors]),
      raw,
    }),
  };
}
