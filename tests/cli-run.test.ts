import { resolve } from 'node:path';
import { describe, expect, it } from 'vitest';

import { runRunCommand } from '../src/cli/commands/run.js';
import { WorkspaceNotFoundError } from '../src/core/gemini/errors.js';
import type { GeminiRequest } from '../src/core/gemini/types.js';

describe('run command', () => {
  it('prints the wire result as one JSON line', async () => {
    const written: string[] = [];
    const requests: GeminiRequest[] = [];

    const res = await runRunCommand({
      prompt: 'say hi',
      cwd: 'some/dir',
      model: 'gemini-2.5-pro',
      execute: async (request) => {
        requests.push(request);
        return { success: true, kind: 'ok', sessionId: 'abc123', agentMessages: 'Hello' };
      },
      write: (text) => written.push(text)
    });

    expect(res).toEqual({ ok: true, result: { success: true, SESSION_ID: 'abc123', agent_messages: 'Hello' } });
    expect(written).toEqual(['{"success":true,"SESSION_ID":"abc123","agent_messages":"Hello"}\n']);
    expect(requests).toEqual([
      {
        prompt: 'say hi',
        cwd: resolve('some/dir'),
        sandbox: false,
        sessionId: '',
        model: 'gemini-2.5-pro',
        returnAllMessages: false
      }
    ]);
  });

  it('defaults the working directory to the current one', async () => {
    const cwds: string[] = [];
    await runRunCommand({
      prompt: 'p',
      execute: async (request) => {
        cwds.push(request.cwd);
        return { success: true, kind: 'ok', sessionId: 's', agentMessages: 'x' };
      },
      write: () => {}
    });
    expect(cwds).toEqual([process.cwd()]);
  });

  it('prints failures and reports them as not ok', async () => {
    const written: string[] = [];

    const res = await runRunCommand({
      prompt: 'p',
      cwd: '/nowhere',
      execute: async () => {
        throw new WorkspaceNotFoundError('/nowhere');
      },
      write: (text) => written.push(text)
    });

    expect(res.ok).toBe(false);
    expect(written).toEqual(['{"success":false,"error":"Workspace directory does not exist: /nowhere"}\n']);
  });
});
