import { execa } from 'execa';
import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

import { fileExists } from '../../utils/fs.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { SpawnError, WorkspaceNotFoundError } from './errors.js';
import { resolveExecutable } from './resolver.js';

/**
 * A running Gemini child as the rest of the pipeline sees it. Owned by a single
 * invocation from launch until `release()`.
 */
export interface GeminiProcess {
  readonly pid: number | undefined;
  /** Stdout split into lines. Exactly one consumer. */
  readonly lines: AsyncIterable<string>;
  /** Resolves once the process has exited. Never rejects. */
  readonly exited: Promise<void>;
  kill(signal: NodeJS.Signals): boolean;
  /** Close the stdout handle. Safe to call more than once. */
  release(): void;
}

export type SpawnGemini = (
  executable: string,
  args: string[],
  options: { cwd: string; env: NodeJS.ProcessEnv; logger: Logger }
) => Promise<GeminiProcess>;

export async function ensureWorkspace(cwd: string): Promise<void> {
  if (!(await fileExists(cwd))) throw new WorkspaceNotFoundError(cwd);
}

export interface LaunchOptions {
  /** Command name or path of the agent binary. */
  command: string;
  args: string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  resolve?: (command: string, env: NodeJS.ProcessEnv) => string;
  spawn?: SpawnGemini;
  logger?: Logger;
}

/**
 * Check the workspace, locate the binary, start the child. Each step fails
 * with its own error and nothing is started unless all of them pass.
 */
export async function launchGemini(opts: LaunchOptions): Promise<GeminiProcess> {
  await ensureWorkspace(opts.cwd);

  const env = opts.env ?? process.env;
  const executable = (opts.resolve ?? resolveExecutable)(opts.command, env);
  const logger = opts.logger ?? silentLogger;
  const spawn = opts.spawn ?? spawnWithExeca;
  logger.debug('gemini_spawn', { executable, args: opts.args, cwd: opts.cwd });

  try {
    return await spawn(executable, opts.args, { cwd: opts.cwd, env, logger });
  } catch (error) {
    if (error instanceof SpawnError) throw error;
    throw new SpawnError(error);
  }
}

/**
 * Stdin is closed and stderr is discarded: a captured stderr that nobody
 * drains can fill its pipe and stall the child while we only read stdout.
 */
export const spawnWithExeca: SpawnGemini = async (executable, args, { cwd, env, logger }) => {
  const proc = execa(executable, args, {
    cwd,
    env,
    extendEnv: false,
    stdin: 'ignore',
    stdout: 'pipe',
    stderr: 'ignore',
    buffer: false,
    reject: false,
    windowsHide: true
  });

  // Either the OS reports the spawn, or execa settles first with the early failure.
  const early = await Promise.race([once(proc, 'spawn').then(() => null), proc]);
  if (early !== null) {
    throw new SpawnError(early instanceof Error ? early : `${executable} exited before it started`);
  }

  const stdout = proc.stdout;
  if (!stdout) {
    proc.kill('SIGKILL');
    throw new SpawnError('stdout pipe is unavailable');
  }

  const exited =
    proc.exitCode !== null || proc.signalCode !== null
      ? Promise.resolve()
      : new Promise<void>((resolve) => {
          proc.once('exit', () => resolve());
        });

  // reject: false, so this settles with the result instead of throwing.
  void proc.then((result) => {
    logger.debug('gemini_exit', { pid: proc.pid, exitCode: result.exitCode ?? null, signal: result.signal ?? null });
  });

  const reader = readLines(stdout);
  let released = false;

  return {
    pid: proc.pid,
    lines: reader.lines,
    exited,
    kill: (signal) => proc.kill(signal),
    release: () => {
      if (released) return;
      released = true;
      reader.close();
      stdout.destroy();
    }
  };
};

/**
 * Line iterator over `input`, subscribed immediately: readline drops lines
 * emitted before anyone iterates, and the first chunk may arrive before the
 * dispatcher starts. Closing ends any pending iteration.
 */
export function readLines(input: Readable): { lines: AsyncIterable<string>; close: () => void } {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const iterator = rl[Symbol.asyncIterator]();
  return {
    lines: { [Symbol.asyncIterator]: () => iterator },
    close: () => rl.close()
  };
}
