/**
 * Debug logger for clickup-cli.
 * Writes leveled lines to stderr and, with --debug-log, to a session file
 * under <configDir>/log.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FetchLike } from '../client/api-client.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface DebugLoggerConfig {
  level?: LogLevel;
  /** Directory for the session log file; no file is written without it. */
  logDir?: string;
  /** Defaults to process.stderr. */
  sink?: LogSink;
  now?: () => Date;
}

export class DebugLogger {
  readonly level: LogLevel;
  readonly logPath?: string;

  private sink: LogSink;
  private now: () => Date;

  constructor(config: DebugLoggerConfig = {}) {
    this.level = config.level ?? 'warn';
    this.sink = config.sink ?? process.stderr;
    this.now = config.now ?? (() => new Date());

    if (config.logDir) {
      if (!fs.existsSync(config.logDir)) {
        fs.mkdirSync(config.logDir, { recursive: true, mode: 0o700 });
      }
      const sessionId = this.now().toISOString().replace(/[:.]/g, '-');
      this.logPath = path.join(config.logDir, `${sessionId}.log`);
    }
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private log(level: LogLevel, message: string): void {
    const line = `[${this.now().toISOString()}] ${level.toUpperCase()} ${message}\n`;

    if (this.enabled(level)) {
      this.sink.write(line);
    }
    // The session file keeps everything, whatever the console level
    if (this.logPath) {
      fs.appendFileSync(this.logPath, line, 'utf-8');
    }
  }
}

function requestMethod(init: RequestInit): string {
  return (init.method ?? 'GET').toUpperCase();
}

/**
 * Wrap a fetch implementation so each request is logged at debug level with
 * its method, URL, status and duration. Headers are never logged.
 */
export function withRequestLogging(fetchImpl: FetchLike, logger: DebugLogger): FetchLike {
  return async (input, init) => {
    const method = requestMethod(init);
    const started = Date.now();
    logger.debug(`→ ${method} ${input}`);

    try {
      const response = await fetchImpl(input, init);
      logger.debug(`← ${response.status} ${method} ${input} (${Date.now() - started}ms)`);
      return response;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug(`✗ ${method} ${input} failed after ${Date.now() - started}ms: ${reason}`);
      throw error;
    }
  };
}
