/**
 * One parsed line of `gemini -o stream-json` output.
 *
 * Only the fields the pipeline reads are typed; every other key of the line is
 * kept untouched in `extra` so newer wire fields survive a round trip.
 */
export interface GeminiEvent {
  readonly type?: string;
  readonly role?: string;
  readonly content?: string;
  readonly sessionId?: string;
  readonly extra: Readonly<Record<string, unknown>>;
}

export interface GeminiRequest {
  prompt: string;
  /** Working directory the agent runs in. Must exist. */
  cwd: string;
  sandbox?: boolean;
  /** Resume an earlier conversation. Empty starts a new one. */
  sessionId?: string;
  /** Model override. Empty keeps the CLI default. */
  model?: string;
  returnAllMessages?: boolean;
}

export type GeminiOutcomeKind = 'ok' | 'timeout' | 'no_session_id' | 'no_agent_messages';

interface GeminiOutcomeBase {
  /** Raw events, only when the caller asked for them. */
  allMessages?: unknown[];
}

export interface GeminiSuccess extends GeminiOutcomeBase {
  success: true;
  kind: 'ok';
  sessionId: string;
  agentMessages: string;
}

export interface GeminiFailure extends GeminiOutcomeBase {
  success: false;
  kind: Exclude<GeminiOutcomeKind, 'ok'>;
  /** Kept when one was captured, so the caller can resume. */
  sessionId?: string;
  error: string;
}

export type GeminiOutcome = GeminiSuccess | GeminiFailure;

/** Shape returned to MCP callers. Absent fields are omitted, never null. */
export interface GeminiWireResult {
  success: boolean;
  SESSION_ID?: string;
  agent_messages?: string;
  all_messages?: unknown[];
  error?: string;
}
