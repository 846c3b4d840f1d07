import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, dirname, join, posix } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';

import { ExecutableNotFoundError } from '../src/core/gemini/errors.js';
import { resolveExecutable } from '../src/core/gemini/resolver.js';

describe('resolveExecutable', () => {
  it('walks PATH in order and returns the first executable match', () => {
    const checked: string[] = [];
    const found = resolveExecutable('gemini', { PATH: '/opt/a:/usr/local/bin:/usr/bin' }, 'linux', (p) => {
      checked.push(p);
      return p === '/usr/local/bin/gemini' || p === '/usr/bin/gemini';
    });

    expect(found).toBe('/usr/local/bin/gemini');
    expect(checked).toEqual(['/opt/a/gemini', '/usr/local/bin/gemini']);
  });

  it('throws ExecutableNotFoundError when nothing matches', () => {
    const attempt = () => resolveExecutable('gemini', { PATH: '/opt/a' }, 'linux', () => false);
    expect(attempt).toThrow(ExecutableNotFoundError);
    expect(attempt).toThrow('Failed to find gemini executable in PATH');
  });

  it('throws for an empty command or an empty PATH', () => {
    expect(() => resolveExecutable('  ', { PATH: '/usr/bin' }, 'linux', () => true)).toThrow(ExecutableNotFoundError);
    expect(() => resolveExecutable('gemini', {}, 'linux', () => true)).toThrow(ExecutableNotFoundError);
  });

  it('checks explicit paths directly without consulting PATH', () => {
    const checked: string[] = [];
    const isExecutable = (p: string) => {
      checked.push(p);
      return true;
    };

    expect(resolveExecutable('/opt/gemini/bin/gemini', { PATH: '/usr/bin' }, 'linux', isExecutable)).toBe(
      '/opt/gemini/bin/gemini'
    );
    expect(resolveExecutable('./bin/gemini', { PATH: '/usr/bin' }, 'linux', isExecutable)).toBe(
      posix.resolve('./bin/gemini')
    );
    expect(checked).toEqual(['/opt/gemini/bin/gemini', posix.resolve('./bin/gemini')]);
  });

  it('applies PATHEXT on Windows and reads Path before PATH', () => {
    const checked: string[] = [];
    const found = resolveExecutable(
      'gemini',
      { Path: 'C:\\tools;C:\\bin', PATH: 'D:\\ignored', PATHEXT: '.exe;cmd' },
      'win32',
      (p) => {
        checked.push(p);
        return p === 'C:\\bin\\gemini.CMD';
      }
    );

    expect(found).toBe('C:\\bin\\gemini.CMD');
    expect(checked).toEqual(['C:\\tools\\gemini.EXE', 'C:\\tools\\gemini.CMD', 'C:\\bin\\gemini.EXE', 'C:\\bin\\gemini.CMD']);
  });

  it('does not add extensions to a Windows command that already has one', () => {
    const checked: string[] = [];
    resolveExecutable('gemini.cmd', { Path: 'C:\\bin', PATHEXT: '.EXE' }, 'win32', (p) => {
      checked.push(p);
      return true;
    });
    expect(checked).toEqual(['C:\\bin\\gemini.cmd']);
  });

  describe('on the real filesystem', () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('finds a real executable', () => {
      const nodeBinary = process.execPath;
      expect(resolveExecutable(basename(nodeBinary), { PATH: dirname(nodeBinary) }, 'linux')).toBe(nodeBinary);
    });

    it('skips files without the execute bit and directories', () => {
      dir = mkdtempSync(join(tmpdir(), 'gemini-resolver-'));
      const plain = join(dir, 'plain');
      const nested = join(dir, 'nested');
      mkdirSync(plain);
      mkdirSync(nested);
      writeFileSync(join(plain, 'gemini'), '#!/bin/sh\n');
      chmodSync(join(plain, 'gemini'), 0o644);
      mkdirSync(join(nested, 'gemini'));

      expect(() => resolveExecutable('gemini', { PATH: `${plain}:${nested}` }, 'linux')).toThrow(
        ExecutableNotFoundError
      );
    });
  });
});
