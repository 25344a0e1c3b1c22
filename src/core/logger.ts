import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function expandHome(path: string): string {
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function renderArg(arg: unknown): unknown {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  if (arg !== null && typeof arg === 'object') {
    try {
      return JSON.stringify(arg);
    } catch {
      return format('%o', arg);
    }
  }
  return arg;
}

export function formatLogLine(level: LogLevel, scope: string | null, args: unknown[]): string {
  const msg = format(...args.map(renderArg));
  const prefix = scope ? `[${scope}] ` : '';
  return `[${new Date().toISOString()}] ${level.toUpperCase()}: ${prefix}${msg}`;
}

export type LoggerOptions = {
  scope?: string;
  filePath?: string | null;
};

/**
 * Console logger with level filtering. When a file path is given every emitted
 * line is mirrored there as well (append-only).
 */
export class Logger {
  private readonly threshold: number;
  private readonly scope: string | null;
  private readonly stream: WriteStream | null;

  constructor(
    private readonly level: LogLevel = 'info',
    options: LoggerOptions = {},
    stream?: WriteStream | null
  ) {
    this.threshold = LEVEL_ORDER[level];
    this.scope = options.scope ?? null;
    if (stream !== undefined) {
      this.stream = stream;
    } else if (options.filePath) {
      const filePath = expandHome(options.filePath);
      mkdirSync(dirname(filePath), { recursive: true });
      this.stream = createWriteStream(filePath, { flags: 'a' });
    } else {
      this.stream = null;
    }
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, { scope: nested }, this.stream);
  }

  debug(...args: unknown[]): void {
    this.emit('debug', args);
  }

  info(...args: unknown[]): void {
    this.emit('info', args);
  }

  warn(...args: unknown[]): void {
    this.emit('warn', args);
  }

  error(...args: unknown[]): void {
    this.emit('error', args);
  }

  close(): void {
    this.stream?.end();
  }

  private emit(level: LogLevel, args: unknown[]): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const line = formatLogLine(level, this.scope, args);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
    this.stream?.write(`${line}\n`);
  }
}

export function createLogger(params?: { level?: LogLevel; filePath?: string | null; scope?: string }): Logger {
  const envLevel = process.env.ARBITER_LOG_LEVEL;
  const level = params?.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  return new Logger(level, { scope: params?.scope, filePath: params?.filePath ?? null });
}
