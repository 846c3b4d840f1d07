import { z } from 'zod';

import { describeError } from './errors.js';
import type { GeminiEvent } from './types.js';

// `null` on the wire means the same as a missing key.
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const GeminiEventWireSchema = z
  .object({
    type: optionalText,
    role: optionalText,
    content: optionalText,
    session_id: optionalText
  })
  .passthrough();

export type ParsedEventLine =
  | { ok: true; event: GeminiEvent; raw: unknown }
  | { ok: false; detail: string };

/**
 * Parse one stream-json line. Never throws: a line that is not JSON, not an
 * object, or carries a named field of the wrong type comes back as `ok: false`
 * with a short reason.
 */
export function parseGeminiEventLine(line: string): ParsedEventLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    return { ok: false, detail: describeError(error) };
  }

  const parsed = GeminiEventWireSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, detail: formatIssues(parsed.error) };
  }

  const { type, role, content, session_id: sessionId, ...extra } = parsed.data;
  const event: GeminiEvent = Object.freeze({
    ...(type !== undefined ? { type } : {}),
    ...(role !== undefined ? { role } : {}),
    ...(content !== undefined ? { content } : {}),
    ...(sessionId !== undefined ? { sessionId } : {}),
    extra: Object.freeze(extra)
  });
  return { ok: true, event, raw };
}

export function isTurnCompleted(event: GeminiEvent): boolean {
  return event.type === 'turn.completed';
}

export function isAssistantMessage(event: GeminiEvent): boolean {
  return event.type === 'message' && event.role === 'assistant';
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
