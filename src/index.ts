export { executeGemini, type ExecuteGemini, type ExecuteGeminiOptions } from './core/gemini/execute.js';
export { buildGeminiArgs, escapeWindowsPrompt } from './core/gemini/args.js';
export { resolveExecutable } from './core/gemini/resolver.js';
export { launchGemini, spawnWithExeca, type GeminiProcess, type SpawnGemini } from './core/gemini/launcher.js';
export { parseGeminiEventLine } from './core/gemini/event-parser.js';
export { ErrorBacklog, ERROR_BACKLOG_CAPACITY } from './core/gemini/backlog.js';
export { resolveGeminiSettings, type GeminiSettings } from './core/gemini/settings.js';
export {
  GeminiError,
  WorkspaceNotFoundError,
  ExecutableNotFoundError,
  SpawnError,
  type GeminiErrorCode
} from './core/gemini/errors.js';
export { toWireResult, serializeWireResult } from './core/gemini/wire.js';
export type {
  GeminiEvent,
  GeminiFailure,
  GeminiOutcome,
  GeminiOutcomeKind,
  GeminiSuccess,
  GeminiRequest,
  GeminiWireResult
} from './core/gemini/types.js';
export { createGeminiServer, runServer, type GeminiServerDeps, type RunServerOptions } from './mcp/server.js';
export { Logger, createLogger, silentLogger, type LogLevel } from './utils/logger.js';
