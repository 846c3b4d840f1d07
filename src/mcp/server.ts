import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { describeError } from '../core/gemini/errors.js';
import { executeGemini, type ExecuteGemini } from '../core/gemini/execute.js';
import { errorWireResult, serializeWireResult, toWireResult } from '../core/gemini/wire.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { detectVersionSync } from '../utils/version.js';

export const SERVER_NAME = 'gemini-mcp';
export const SERVER_INSTRUCTIONS = 'Gemini MCP Server - Wraps Gemini CLI as a standard MCP protocol interface';

export const GeminiToolInputShape = {
  PROMPT: z.string().min(1).describe('The prompt/instruction to send to Gemini'),
  cd: z.string().min(1).describe('Working directory for Gemini to execute in'),
  sandbox: z.boolean().default(false).describe('Run in sandbox mode (default: false)'),
  SESSION_ID: z.string().default('').describe('Session ID to resume a previous conversation'),
  return_all_messages: z
    .boolean()
    .default(false)
    .describe('Return all messages including reasoning and tool calls (default: false)'),
  model: z.string().default('').describe('Model to use (only specify if user explicitly requests)')
};

export const GeminiToolInputSchema = z.object(GeminiToolInputShape);
export type GeminiToolInput = z.infer<typeof GeminiToolInputSchema>;

const GEMINI_TOOL_DESCRIPTION = `Invokes the Gemini CLI to execute AI-driven tasks, returning structured JSON events and a session identifier for conversation continuity.

**Return structure:**
- \`success\`: boolean indicating execution status
- \`SESSION_ID\`: unique identifier for resuming this conversation in future calls
- \`agent_messages\`: concatenated assistant response text
- \`all_messages\`: (optional) complete array of JSON events when \`return_all_messages=True\`
- \`error\`: error description when \`success=False\`

**Best practices:**
- Always capture and reuse \`SESSION_ID\` for multi-turn interactions
- Enable \`sandbox\` mode when file modifications should be isolated
- Use \`return_all_messages\` only when detailed execution traces are necessary (increases payload size)
- Only pass \`model\` when the user has explicitly requested a specific model`;

export interface GeminiServerDeps {
  execute?: ExecuteGemini;
  logger?: Logger;
}

/**
 * Run one tool call. Never throws: hard failures become a `success: false`
 * payload so the MCP call itself still succeeds, as clients expect.
 */
export async function handleGeminiTool(input: GeminiToolInput, deps: GeminiServerDeps = {}): Promise<CallToolResult> {
  const execute = deps.execute ?? executeGemini;
  const logger = deps.logger ?? silentLogger;

  let text: string;
  try {
    const outcome = await execute(
      {
        prompt: input.PROMPT,
        cwd: input.cd,
        sandbox: input.sandbox,
        sessionId: input.SESSION_ID,
        model: input.model,
        returnAllMessages: input.return_all_messages
      },
      { logger }
    );
    text = serializeWireResult(toWireResult(outcome));
  } catch (error) {
    logger.error('gemini_tool_failed', { message: describeError(error) });
    text = serializeWireResult(errorWireResult(error));
  }

  return { content: [{ type: 'text', text }] };
}

export function createGeminiServer(deps: GeminiServerDeps = {}): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: detectVersionSync() ?? '0.0.0' },
    { capabilities: { tools: {} }, instructions: SERVER_INSTRUCTIONS }
  );

  server.registerTool(
    'gemini',
    {
      title: 'Gemini',
      description: GEMINI_TOOL_DESCRIPTION,
      inputSchema: GeminiToolInputShape
    },
    async (input) => handleGeminiTool(input, deps)
  );

  return server;
}

export interface RunServerOptions extends GeminiServerDeps {
  /** Defaults to stdio. */
  transport?: Transport;
}

/** Serve until the transport closes or the process is signalled. */
export async function runServer(opts: RunServerOptions = {}): Promise<void> {
  const logger = opts.logger ?? silentLogger;
  logger.info('server_starting', { name: SERVER_NAME });

  const server = createGeminiServer(opts);
  const transport = opts.transport ?? new StdioServerTransport();

  const closed = new Promise<void>((resolve) => {
    transport.onclose = () => resolve();
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.warn('shutdown_signal', { signal });
    server.close().catch((error: unknown) => {
      logger.error('server_close_failed', { message: describeError(error) });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await server.connect(transport);
    logger.info('server_running');

    await closed;
    logger.info('server_stopped');
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}
