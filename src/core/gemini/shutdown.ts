import { silentLogger, type Logger } from '../../utils/logger.js';
import type { GeminiProcess } from './launcher.js';
import { DEFAULT_WAIT_TIMEOUT_MS } from './settings.js';

export type ShutdownResult = 'exited' | 'killed' | 'unreaped';

/**
 * Give the child `waitTimeoutMs` to exit on its own (some CLI versions linger
 * after the turn), then SIGKILL it and wait once more with the same bound.
 * Stdout is released on every path.
 */
export async function shutdownProcess(
  proc: GeminiProcess,
  opts: { waitTimeoutMs?: number; logger?: Logger } = {}
): Promise<ShutdownResult> {
  const waitMs = opts.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
  const logger = opts.logger ?? silentLogger;

  try {
    if (await waitForExit(proc, waitMs)) return 'exited';

    logger.warn('gemini_force_kill', { pid: proc.pid, waitTimeoutMs: waitMs });
    proc.kill('SIGKILL');

    if (await waitForExit(proc, waitMs)) return 'killed';

    logger.error('gemini_unreaped', { pid: proc.pid });
    return 'unreaped';
  } finally {
    proc.release();
  }
}

async function waitForExit(proc: GeminiProcess, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      proc.exited.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      })
    ]);
  } finally {
    clearTimeout(timer);
  }
}
