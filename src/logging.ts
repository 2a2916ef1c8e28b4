// src/logging.ts
import * as fs from 'fs';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export function parseLogLevel(value: unknown): LogLevel {
  if (typeof value === 'string') {
    switch (value.toLowerCase()) {
      case 'debug':
      case 'trace':
        return LogLevel.DEBUG;
      case 'info':
        return LogLevel.INFO;
      case 'warn':
      case 'warning':
        return LogLevel.WARN;
      case 'error':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= LogLevel.DEBUG && value <= LogLevel.ERROR) {
    return value;
  }
  return LogLevel.INFO;
}

/**
 * Where formatted log lines go. The terminal owns stdout, so the
 * dashboard writes to a file; tests may install an in-memory sink.
 */
export interface LogSink {
  appendLine(line: string): void;
  dispose?(): void;
}

let sink: LogSink | undefined;
export let currentLogLevel: LogLevel = LogLevel.INFO;

export function configureLogging(level: LogLevel, target: LogSink | undefined): void {
  sink?.dispose?.();
  sink = target;
  currentLogLevel = level;
}

export function createFileSink(filePath: string): LogSink {
  const stream = fs.createWriteStream(filePath, { flags: 'a' });
  return {
    appendLine: line => {
      stream.write(`${line}\n`);
    },
    dispose: () => {
      stream.end();
    }
  };
}

/** `./kubeglance-debug-<YYYYMMDDHHmmss>.log` */
export function defaultLogFileName(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `./kubeglance-debug-${stamp}.log`;
}

export function log(
  message: string,
  level: LogLevel = LogLevel.INFO,
  forceLog: boolean = false,
  elapsedTime?: number
): void {
  if (!sink) {
    return;
  }
  if (level >= currentLogLevel || forceLog) {
    const prefix = LogLevel[level].padEnd(5);
    const timestamp = new Date().toISOString().replace('T', ' ').replace('Z', '');
    let logMessage = `[${timestamp}] [${prefix}] ${message}`;
    if (level === LogLevel.INFO && elapsedTime !== undefined) {
      logMessage += ` (took ${elapsedTime}ms)`;
    }
    sink.appendLine(logMessage);
  }
}

const lastOriginLog = new Map<string, number>();

/**
 * Log at most once per second for a given origin; used on hot paths
 * such as watch events.
 */
export function logThrottled(origin: string, message: string, level: LogLevel = LogLevel.DEBUG): void {
  const now = Date.now();
  const last = lastOriginLog.get(origin) ?? 0;
  if (now - last > 1000) {
    lastOriginLog.set(origin, now);
    log(message, level);
  }
}

export function measurePerformance<T>(
  operation: () => Promise<T>,
  description: string,
  logLevel: LogLevel = LogLevel.INFO,
  forceLog: boolean = false
): Promise<T> {
  const startTime = Date.now();
  return operation().then(result => {
    const elapsedTime = Date.now() - startTime;
    let logMessage = description;
    if (typeof result === 'string') {
      logMessage = result;
    }
    log(logMessage, logLevel, forceLog, elapsedTime);
    return result;
  }).catch(error => {
    const elapsedTime = Date.now() - startTime;
    log(`${description} - Failed: ${error}`, LogLevel.ERROR, true, elapsedTime);
    throw error;
  });
}
