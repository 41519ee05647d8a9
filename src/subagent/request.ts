import { nanoid } from 'nanoid';
import type { InvocationRequest } from './types.js';

/**
 * Build an immutable request with a fresh id.
 */
export function createRequest(agentName: string, taskPrompt: string, now: number = Date.now()): InvocationRequest {
  return Object.freeze({
    requestId: nanoid(),
    agentName,
    taskPrompt,
    submittedAt: now,
  });
}
