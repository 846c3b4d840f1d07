import { resolve } from 'node:path';

import { executeGemini, type ExecuteGemini } from '../../core/gemini/execute.js';
import type { GeminiWireResult } from '../../core/gemini/types.js';
import { errorWireResult, serializeWireResult, toWireResult } from '../../core/gemini/wire.js';
import { silentLogger, type Logger } from '../../utils/logger.js';

export interface RunCommandOptions {
  prompt: string;
  cwd?: string;
  sandbox?: boolean;
  sessionId?: string;
  model?: string;
  allMessages?: boolean;
  execute?: ExecuteGemini;
  logger?: Logger;
  /** Defaults to stdout. */
  write?: (text: string) => void;
}

/**
 * `gemini-mcp run <prompt>`: one invocation outside MCP. Prints the same JSON a
 * tool call would return.
 */
export async function runRunCommand(opts: RunCommandOptions): Promise<{ ok: boolean; result: GeminiWireResult }> {
  const execute = opts.execute ?? executeGemini;
  const logger = opts.logger ?? silentLogger;
  const write = opts.write ?? ((text: string) => process.stdout.write(text));

  let result: GeminiWireResult;
  try {
    const outcome = await execute(
      {
        prompt: opts.prompt,
        cwd: resolve(opts.cwd ?? process.cwd()),
        sandbox: opts.sandbox === true,
        sessionId: opts.sessionId ?? '',
        model: opts.model ?? '',
        returnAllMessages: opts.allMessages === true
      },
      { logger }
    );
    result = toWireResult(outcome);
  } catch (error) {
    result = errorWireResult(error);
  }

  write(`${serializeWireResult(result)}\n`);
  return { ok: result.success, result };
}
