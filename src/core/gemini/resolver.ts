import { accessSync, constants, statSync } from 'node:fs';
import { posix, win32 } from 'node:path';

import { ExecutableNotFoundError } from './errors.js';

const DEFAULT_WINDOWS_PATHEXT = ['.COM', '.EXE', '.BAT', '.CMD'];

export type IsExecutableFn = (path: string) => boolean;

/**
 * Locate `command` on the search path and return its absolute path.
 *
 * Runs on every invocation: PATH may change while the server is up.
 */
export function resolveExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  isExecutable: IsExecutableFn = defaultIsExecutable(platform)
): string {
  const trimmed = command.trim();
  if (!trimmed) throw new ExecutableNotFoundError(command);

  const windows = platform === 'win32';
  const paths = windows ? win32 : posix;
  const extensions = windows ? windowsExtensions(env) : [];

  const variants = (base: string): string[] =>
    windows && !paths.extname(base) ? extensions.map((ext) => `${base}${ext}`) : [base];

  // Explicit paths skip the PATH search.
  if (trimmed.includes('/') || (windows && trimmed.includes('\\'))) {
    const absolute = paths.isAbsolute(trimmed) ? trimmed : paths.resolve(trimmed);
    const found = [absolute, ...(windows ? variants(absolute) : [])].find((candidate) => isExecutable(candidate));
    if (found) return found;
    throw new ExecutableNotFoundError(trimmed);
  }

  const pathValue = windows ? (env.Path ?? env.PATH) : env.PATH;
  const dirs = (pathValue ?? '')
    .split(paths.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  for (const dir of dirs) {
    for (const name of variants(trimmed)) {
      const candidate = paths.resolve(dir, name);
      if (isExecutable(candidate)) return candidate;
    }
  }

  throw new ExecutableNotFoundError(trimmed);
}

function windowsExtensions(env: NodeJS.ProcessEnv): string[] {
  return (env.PATHEXT ?? DEFAULT_WINDOWS_PATHEXT.join(';'))
    .split(';')
    .map((ext) => ext.trim().toUpperCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

function defaultIsExecutable(platform: NodeJS.Platform): IsExecutableFn {
  return (path) => {
    try {
      if (!statSync(path).isFile()) return false;
      if (platform !== 'win32') accessSync(path, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  };
}
