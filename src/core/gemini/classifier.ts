import type { ErrorBacklog } from './backlog.js';
import type { GeminiOutcome } from './types.js';

export interface ClassifyInput {
  timedOut: boolean;
  sessionId?: string;
  agentMessages: string;
  backlog: ErrorBacklog;
  allMessages?: unknown[];
}

export const NO_SESSION_ID_MESSAGE = 'Failed to get `SESSION_ID` from the gemini session.';
export const NO_AGENT_MESSAGES_MESSAGE =
  'Failed to retrieve `agent_messages` data from the Gemini session. ' +
  'This might be due to Gemini performing a tool call. ' +
  'You can continue using the `SESSION_ID` to proceed with the conversation.';

/**
 * Timeout beats a missing session id, which beats an empty answer. The backlog
 * is only ever reported on failures.
 */
export function classifyOutcome(input: ClassifyInput): GeminiOutcome {
  const backlog = input.backlog.join('\n');
  const sessionId = input.sessionId !== undefined ? { sessionId: input.sessionId } : {};
  const allMessages = input.allMessages ? { allMessages: [...input.allMessages] } : {};

  if (input.timedOut) {
    return {
      success: false,
      kind: 'timeout',
      ...sessionId,
      ...allMessages,
      error: backlog ? `Process timeout. ${backlog}` : 'Process timeout.'
    };
  }

  if (input.sessionId === undefined) {
    return { success: false, kind: 'no_session_id', ...allMessages, error: withBacklog(NO_SESSION_ID_MESSAGE, backlog) };
  }

  if (!input.agentMessages) {
    return {
      success: false,
      kind: 'no_agent_messages',
      ...sessionId,
      ...allMessages,
      error: withBacklog(NO_AGENT_MESSAGES_MESSAGE, backlog)
    };
  }

  return { success: true, kind: 'ok', sessionId: input.sessionId, agentMessages: input.agentMessages, ...allMessages };
}

function withBacklog(message: string, backlog: string): string {
  return backlog ? `${message}\n\n${backlog}` : message;
}
