export type GeminiErrorCode = 'WORKSPACE_NOT_FOUND' | 'EXECUTABLE_NOT_FOUND' | 'SPAWN_FAILED';

/**
 * Hard failures of a Gemini invocation. Anything thrown as a `GeminiError`
 * happens before (or while) the child process is started, so no outcome exists.
 * Timeouts and incomplete sessions are reported as failed outcomes instead.
 */
export abstract class GeminiError extends Error {
  abstract readonly code: GeminiErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class WorkspaceNotFoundError extends GeminiError {
  readonly code = 'WORKSPACE_NOT_FOUND';

  constructor(readonly workspacePath: string) {
    super(`Workspace directory does not exist: ${workspacePath}`);
  }
}

export class ExecutableNotFoundError extends GeminiError {
  readonly code = 'EXECUTABLE_NOT_FOUND';

  constructor(readonly command: string) {
    super(`Failed to find ${command} executable in PATH`);
  }
}

export class SpawnError extends GeminiError {
  readonly code = 'SPAWN_FAILED';

  constructor(cause: unknown) {
    super(`Failed to spawn gemini process: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
