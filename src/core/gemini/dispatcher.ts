import { setTimeout as sleep } from 'node:timers/promises';

import { silentLogger, type Logger } from '../../utils/logger.js';
import { ErrorBacklog } from './backlog.js';
import { describeError } from './errors.js';
import { isAssistantMessage, isTurnCompleted, parseGeminiEventLine } from './event-parser.js';
import { DEFAULT_TURN_GRACE_MS } from './settings.js';

/** Printed by newer CLI versions as assistant content; not part of the answer. */
export const DEPRECATED_PROMPT_WARNING = 'The --prompt (-p) flag has been deprecated';

/** What the reader has accumulated so far. Append-only within one invocation. */
export interface DispatchState {
  sessionId?: string;
  agentMessages: string;
  /** Raw events, only when the caller asked for them. */
  allMessages?: unknown[];
  backlog: ErrorBacklog;
  linesRead: number;
}

export type DispatchEnd = 'turn_completed' | 'end_of_stream' | 'io_error' | 'aborted';

export interface DispatchOptions {
  turnGraceMs?: number;
  /** Raised by the deadline supervisor; no line is handled after it fires. */
  signal?: AbortSignal;
  logger?: Logger;
}

export function createDispatchState(returnAllMessages = false): DispatchState {
  return {
    agentMessages: '',
    ...(returnAllMessages ? { allMessages: [] } : {}),
    backlog: new ErrorBacklog(),
    linesRead: 0
  };
}

/**
 * Fold the stream-json lines of one turn into `state`. Resolves when the turn
 * completes, the stream ends, a read fails, or the signal fires; never rejects.
 */
export async function dispatchEvents(
  lines: AsyncIterable<string>,
  state: DispatchState,
  opts: DispatchOptions = {}
): Promise<DispatchEnd> {
  const logger = opts.logger ?? silentLogger;

  try {
    for await (const rawLine of lines) {
      if (opts.signal?.aborted) return 'aborted';

      const line = rawLine.trim();
      if (!line) continue;
      state.linesRead += 1;

      const parsed = parseGeminiEventLine(line);
      if (!parsed.ok) {
        logger.debug('gemini_unparsable_line', { detail: parsed.detail });
        state.backlog.push(`[parse error] ${parsed.detail}: ${line}`);
        continue;
      }

      const { event } = parsed;
      state.allMessages?.push(parsed.raw);

      if (event.sessionId !== undefined) state.sessionId = event.sessionId;

      if (isAssistantMessage(event) && event.content !== undefined && !event.content.includes(DEPRECATED_PROMPT_WARNING)) {
        state.agentMessages += event.content;
      }

      if (isTurnCompleted(event)) {
        // Let trailing buffered output flush before the reader lets go.
        await sleep(opts.turnGraceMs ?? DEFAULT_TURN_GRACE_MS);
        return 'turn_completed';
      }
    }
    return 'end_of_stream';
  } catch (error) {
    if (opts.signal?.aborted) return 'aborted';
    state.backlog.push(`[io error] ${describeError(error)}`);
    return 'io_error';
  }
}
