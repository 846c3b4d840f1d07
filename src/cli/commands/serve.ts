import { runServer } from '../../mcp/server.js';
import type { Logger } from '../../utils/logger.js';

/** `gemini-mcp serve` (the default): MCP over stdio. */
export async function runServeCommand(opts: { logger: Logger }): Promise<{ ok: boolean; details?: unknown }> {
  try {
    await runServer({ logger: opts.logger });
    return { ok: true };
  } catch (error) {
    return { ok: false, details: error instanceof Error ? error.message : String(error) };
  }
}
