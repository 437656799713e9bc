import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function currentLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
}

interface LogMeta {
  correlationId?: string;
  sessionId?: string;
  category?: string;
  stage?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

let logDirReady: string | null = null;

// JSON-lines file output is opt-in through LOG_DIR
function appendToLogFile(entry: Record<string, unknown>): void {
  const logDir = process.env.LOG_DIR;
  if (!logDir) return;

  try {
    if (logDirReady !== logDir) {
      fs.mkdirSync(logDir, { recursive: true });
      logDirReady = logDir;
    }
    const dateStr = new Date().toISOString().split('T')[0];
    fs.appendFileSync(path.join(logDir, `drafting-${dateStr}.log`), JSON.stringify(entry) + '\n');
  } catch (err) {
    console.error('[Logger] Failed to write to log file:', err);
  }
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel()]) return;

  appendToLogFile({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta
  });

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  log('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  log('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  log('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  log('debug', message, meta);
}

/**
 * Per-turn logger: one correlation id and a stopwatch per pipeline stage.
 */
export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private sessionId?: string;
  private stages: Map<string, number> = new Map();

  constructor(sessionId?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.sessionId = sessionId;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      sessionId: this.sessionId,
      duration: Date.now() - this.startTime,
      ...extra
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    logDebug(`Stage ${name} finished`, this.getMeta({ stage: name, stageDuration: duration }));
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }
}
