import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createDispatchState, dispatchEvents } from '../src/core/gemini/dispatcher.js';
import { executeGemini } from '../src/core/gemini/execute.js';
import { launchGemini } from '../src/core/gemini/launcher.js';
import { shutdownProcess } from '../src/core/gemini/shutdown.js';

const TURN = [
  { type: 'init', session_id: 'abc123' },
  { type: 'message', role: 'assistant', content: 'Hel' },
  { type: 'message', role: 'assistant', content: 'lo' },
  { type: 'turn.completed' }
];

function printLines(...lines: Array<Record<string, unknown> | string>): string {
  return lines
    .map((line) => `process.stdout.write(${JSON.stringify(`${typeof line === 'string' ? line : JSON.stringify(line)}\n`)});`)
    .join('\n');
}

const KEEP_ALIVE = 'setInterval(() => {}, 1_000);';

describe('gemini launcher with real processes', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gemini-launcher-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeScript(name: string, body: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, `#!${process.execPath}\n${body}\n`, 'utf8');
    await chmod(path, 0o755);
    return path;
  }

  it('answers while flooding stderr', async () => {
    const binary = await writeScript('flood', [`process.stderr.write('x'.repeat(1024 * 1024));`, printLines(...TURN)].join('\n'));

    const outcome = await executeGemini(
      { prompt: 'say hi', cwd: dir },
      { binary, env: {}, turnGraceMs: 0, waitTimeoutMs: 2_000, processTimeoutMs: 8_000 }
    );

    expect(outcome).toEqual({ success: true, kind: 'ok', sessionId: 'abc123', agentMessages: 'Hello' });
  });

  it('kills a child that lingers after the turn', async () => {
    const binary = await writeScript('linger', [printLines(...TURN), KEEP_ALIVE].join('\n'));

    const started = Date.now();
    const outcome = await executeGemini(
      { prompt: 'say hi', cwd: dir },
      { binary, env: {}, turnGraceMs: 0, waitTimeoutMs: 300, processTimeoutMs: 8_000 }
    );

    expect(outcome).toEqual({ success: true, kind: 'ok', sessionId: 'abc123', agentMessages: 'Hello' });
    expect(Date.now() - started).toBeLessThan(8_000);
  });

  it('times out a stalled child and keeps what it printed', async () => {
    const binary = await writeScript('stall', [printLines('garbage', { type: 'init', session_id: 's-stall' }), KEEP_ALIVE].join('\n'));

    const outcome = await executeGemini(
      { prompt: 'p', cwd: dir },
      { binary, env: {}, turnGraceMs: 0, waitTimeoutMs: 300, processTimeoutMs: 1_500 }
    );

    expect(outcome.success).toBe(false);
    expect(outcome.kind).toBe('timeout');
    expect(outcome.sessionId).toBe('s-stall');
    if (outcome.success) return;
    expect(outcome.error.startsWith('Process timeout. [parse error] ')).toBe(true);
    expect(outcome.error.endsWith(': garbage')).toBe(true);
  });

  it('reports a child that exits without answering', async () => {
    const binary = await writeScript('silent', printLines({ type: 'init', session_id: 's-quiet' }));

    const outcome = await executeGemini(
      { prompt: 'p', cwd: dir },
      { binary, env: {}, turnGraceMs: 0, waitTimeoutMs: 2_000, processTimeoutMs: 8_000 }
    );

    expect(outcome.kind).toBe('no_agent_messages');
    expect(outcome.sessionId).toBe('s-quiet');
  });

  it('keeps lines printed before anyone reads them', async () => {
    const binary = await writeScript('early', printLines(...TURN));

    const proc = await launchGemini({ command: binary, args: [], cwd: dir, env: {} });
    await proc.exited;
    await sleep(50);

    const state = createDispatchState();
    const end = await dispatchEvents(proc.lines, state, { turnGraceMs: 0 });

    expect(end).toBe('turn_completed');
    expect(state.sessionId).toBe('abc123');
    expect(state.agentMessages).toBe('Hello');
    await expect(shutdownProcess(proc, { waitTimeoutMs: 500 })).resolves.toBe('exited');
  });
});
