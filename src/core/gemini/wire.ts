import { describeError } from './errors.js';
import type { GeminiOutcome, GeminiWireResult } from './types.js';

export function toWireResult(outcome: GeminiOutcome): GeminiWireResult {
  const allMessages = outcome.allMessages !== undefined ? { all_messages: outcome.allMessages } : {};

  if (outcome.success) {
    return { success: true, SESSION_ID: outcome.sessionId, agent_messages: outcome.agentMessages, ...allMessages };
  }

  return {
    success: false,
    ...(outcome.sessionId !== undefined ? { SESSION_ID: outcome.sessionId } : {}),
    ...allMessages,
    error: outcome.error
  };
}

export function errorWireResult(error: unknown): GeminiWireResult {
  return { success: false, error: describeError(error) };
}

export function serializeWireResult(result: GeminiWireResult): string {
  try {
    return JSON.stringify(result);
  } catch (error) {
    return JSON.stringify({ success: false, error: `JSON serialization error: ${describeError(error)}` });
  }
}
