#!/usr/bin/env node
import { Command } from 'commander';

import { createLogger, type Logger } from '../utils/logger.js';
import { detectVersionSync } from '../utils/version.js';
import { runRunCommand } from './commands/run.js';
import { runServeCommand } from './commands/serve.js';

export function buildCli(argv: string[]) {
  const program = new Command();

  let logger: Logger = createLogger();

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('gemini-mcp')
    .description('MCP server that wraps the Gemini CLI as a standard MCP protocol interface')
    .version(version, '-v, --version');

  program.option('--verbose', 'Enable verbose logging');

  program.hook('preAction', (thisCommand) => {
    logger = createLogger({ verbose: thisCommand.opts<{ verbose?: boolean }>().verbose === true });
  });

  program
    .command('serve', { isDefault: true })
    .description('Serve the gemini tool over stdio (default)')
    .action(async () => {
      const res = await runServeCommand({ logger });
      if (!res.ok) {
        logger.error('server_failed', { details: res.details });
        process.exitCode = 1;
      }
    });

  program
    .command('run')
    .description('Run one Gemini turn and print the result as JSON')
    .argument('<prompt>', 'Instruction to send to Gemini')
    .option('--cd <dir>', 'Working directory (defaults to the current one)')
    .option('--sandbox', 'Run in sandbox mode')
    .option('--session-id <id>', 'Resume an earlier session')
    .option('--model <name>', 'Model override')
    .option('--all-messages', 'Include every raw event in the result')
    .action(
      async (
        prompt: string,
        opts: { cd?: string; sandbox?: boolean; sessionId?: string; model?: string; allMessages?: boolean }
      ) => {
        const res = await runRunCommand({
          prompt,
          cwd: opts.cd,
          sandbox: !!opts.sandbox,
          sessionId: opts.sessionId,
          model: opts.model,
          allMessages: !!opts.allMessages,
          logger
        });
        if (!res.ok) process.exitCode = 1;
      }
    );

  return program.parseAsync(argv);
}

buildCli(process.argv).catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
