import { silentLogger, type Logger } from '../../utils/logger.js';
import { buildGeminiArgs } from './args.js';
import { classifyOutcome } from './classifier.js';
import { createDispatchState, dispatchEvents, type DispatchEnd } from './dispatcher.js';
import { launchGemini, type SpawnGemini } from './launcher.js';
import { resolveGeminiSettings, type GeminiSettings } from './settings.js';
import { shutdownProcess } from './shutdown.js';
import { superviseDeadline, type Supervised } from './supervisor.js';
import type { GeminiOutcome, GeminiRequest } from './types.js';

export interface ExecuteGeminiOptions extends Partial<GeminiSettings> {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  resolve?: (command: string, env: NodeJS.ProcessEnv) => string;
  spawn?: SpawnGemini;
  logger?: Logger;
}

export type ExecuteGemini = (request: GeminiRequest, options?: ExecuteGeminiOptions) => Promise<GeminiOutcome>;

/**
 * Run one Gemini turn and classify what came back.
 *
 * Throws only when nothing could be started (`WorkspaceNotFoundError`,
 * `ExecutableNotFoundError`, `SpawnError`). Timeouts and incomplete turns are
 * failed outcomes. The child is always waited for, and killed if it lingers,
 * before this resolves.
 */
export const executeGemini: ExecuteGemini = async (request, options = {}) => {
  const env = options.env ?? process.env;
  const settings = { ...resolveGeminiSettings(env), ...definedOnly(options) };
  const logger = options.logger ?? silentLogger;

  const args = buildGeminiArgs(
    { prompt: request.prompt, sandbox: request.sandbox, sessionId: request.sessionId, model: request.model },
    options.platform
  );

  const proc = await launchGemini({
    command: settings.binary,
    args,
    cwd: request.cwd,
    env,
    resolve: options.resolve,
    spawn: options.spawn,
    logger
  });

  const state = createDispatchState(request.returnAllMessages === true);
  let supervised: Supervised<DispatchEnd>;
  try {
    supervised = await superviseDeadline(
      (signal) => dispatchEvents(proc.lines, state, { turnGraceMs: settings.turnGraceMs, signal, logger }),
      settings.processTimeoutMs
    );
  } finally {
    await shutdownProcess(proc, { waitTimeoutMs: settings.waitTimeoutMs, logger });
  }

  if (supervised.timedOut) {
    logger.warn('gemini_timeout', { pid: proc.pid, timeoutMs: settings.processTimeoutMs, linesRead: state.linesRead });
  }

  const outcome = classifyOutcome({
    timedOut: supervised.timedOut,
    sessionId: state.sessionId,
    agentMessages: state.agentMessages,
    backlog: state.backlog,
    allMessages: state.allMessages
  });
  logger.debug('gemini_outcome', {
    kind: outcome.kind,
    end: supervised.timedOut ? 'timeout' : supervised.value,
    linesRead: state.linesRead,
    backlog: state.backlog.size
  });
  return outcome;
};

function definedOnly(options: ExecuteGeminiOptions): Partial<GeminiSettings> {
  const out: Partial<GeminiSettings> = {};
  if (options.binary !== undefined) out.binary = options.binary;
  if (options.processTimeoutMs !== undefined) out.processTimeoutMs = options.processTimeoutMs;
  if (options.waitTimeoutMs !== undefined) out.waitTimeoutMs = options.waitTimeoutMs;
  if (options.turnGraceMs !== undefined) out.turnGraceMs = options.turnGraceMs;
  return out;
}
