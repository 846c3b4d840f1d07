import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Defaults to stderr: stdout carries the MCP protocol. */
  write?: (line: string) => void;
  color?: boolean;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const levelColor: Record<LogLevel, (s: string) => string> = {
  debug: chalk.dim,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  isEnabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.opts.level ?? 'info'];
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const write = this.opts.write ?? ((line: string) => process.stderr.write(line));
    const timestamp = new Date().toISOString();

    if (this.opts.json) {
      write(`${safeJson({ timestamp, level, message, data })}\n`);
      return;
    }

    const label = this.opts.color ? levelColor[level](level) : level;
    const line = data === undefined ? `${timestamp} ${label} ${message}` : `${timestamp} ${label} ${message} ${safeJson(data)}`;
    write(`${line}\n`);
  }
}

export const silentLogger = new Logger({ write: () => {} });

/**
 * Logger for the host process. `--verbose` lowers the level to debug;
 * GEMINI_MCP_LOG_JSON=1 switches to one JSON object per line.
 */
export function createLogger(opts: { verbose?: boolean; env?: NodeJS.ProcessEnv } = {}): Logger {
  const env = opts.env ?? process.env;
  return new Logger({
    level: opts.verbose ? 'debug' : 'info',
    json: env.GEMINI_MCP_LOG_JSON === '1',
    color: process.stderr.isTTY === true && !env.NO_COLOR
  });
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
