export const DEFAULT_GEMINI_BINARY = 'gemini';
export const DEFAULT_PROCESS_TIMEOUT_MS = 300_000;
export const DEFAULT_WAIT_TIMEOUT_MS = 5_000;
export const DEFAULT_TURN_GRACE_MS = 300;

const MIN_PROCESS_TIMEOUT_MS = 1_000;
const MIN_WAIT_TIMEOUT_MS = 100;
const MIN_TURN_GRACE_MS = 0;

export interface GeminiSettings {
  binary: string;
  /** Hard deadline for reading the event stream. */
  processTimeoutMs: number;
  /** How long the child may take to exit on its own, and again after SIGKILL. */
  waitTimeoutMs: number;
  /** Flush delay after `turn.completed` before the reader stops. */
  turnGraceMs: number;
}

export function resolveGeminiSettings(env: NodeJS.ProcessEnv = process.env): GeminiSettings {
  return {
    binary: env.GEMINI_MCP_BINARY?.trim() || DEFAULT_GEMINI_BINARY,
    processTimeoutMs: resolveMs(env.GEMINI_MCP_PROCESS_TIMEOUT_MS, DEFAULT_PROCESS_TIMEOUT_MS, MIN_PROCESS_TIMEOUT_MS),
    waitTimeoutMs: resolveMs(env.GEMINI_MCP_WAIT_TIMEOUT_MS, DEFAULT_WAIT_TIMEOUT_MS, MIN_WAIT_TIMEOUT_MS),
    turnGraceMs: resolveMs(env.GEMINI_MCP_TURN_GRACE_MS, DEFAULT_TURN_GRACE_MS, MIN_TURN_GRACE_MS)
  };
}

function resolveMs(raw: string | undefined, fallback: number, min: number): number {
  if (!raw || !raw.trim()) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;

  const ms = Math.floor(parsed);
  if (ms < min) return min;
  return ms;
}
