/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

export enum LogLevel {
  MINIMAL = 'minimal',
  NORMAL = 'normal',
  VERBOSE = 'verbose',
}

export interface LoggerConfig {
  debugEnabled: boolean;
  debugLevel: LogLevel;
  /** Suppresses warnings and errors too; used by embedders that report on their own. */
  quiet: boolean;
}

export type LogSink = (line: string) => void;

const levelPriority: Record<LogLevel, number> = {
  [LogLevel.MINIMAL]: 1,
  [LogLevel.NORMAL]: 2,
  [LogLevel.VERBOSE]: 3,
};

export class DebugLogger {
  private component: string;
  private redact: (message: string) => string;

  constructor(component: string, redact?: (message: string) => string) {
    this.component = component;
    this.redact = redact ?? ((message) => message);
  }

  /**
   * Returns a logger for the same component whose output passes through `redact`.
   */
  withRedaction(redact: (message: string) => string): DebugLogger {
    return new DebugLogger(this.component, redact);
  }

  private shouldLog(level: LogLevel): boolean {
    if (!globalLoggerConfig.debugEnabled) {
      return false;
    }
    return levelPriority[level] <= levelPriority[globalLoggerConfig.debugLevel];
  }

  private write(tag: string, message: string): void {
    // stdout belongs to the workflow's own output
    globalSink(`[${tag}] [${this.component}] ${this.redact(message)}`);
  }

  debug(message: string, level: LogLevel = LogLevel.NORMAL): void {
    if (this.shouldLog(level)) {
      this.write('DEBUG', message);
    }
  }

  info(message: string): void {
    if (this.shouldLog(LogLevel.MINIMAL)) {
      this.write('INFO', message);
    }
  }

  warn(message: string): void {
    if (globalLoggerConfig.quiet) {
      return;
    }
    this.write('WARN', message);
  }

  error(message: string): void {
    if (globalLoggerConfig.quiet) {
      return;
    }
    this.write('ERROR', message);
  }
}

let globalLoggerConfig: LoggerConfig = {
  debugEnabled: false,
  debugLevel: LogLevel.MINIMAL,
  quiet: false,
};

let globalSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalLoggerConfig = { ...globalLoggerConfig, ...config };
}

export function getGlobalLoggerConfig(): LoggerConfig {
  return { ...globalLoggerConfig };
}

/**
 * Replaces the stderr sink. Returns the previous sink so callers can restore it.
 */
export function setLogSink(sink: LogSink): LogSink {
  const previous = globalSink;
  globalSink = sink;
  return previous;
}

export function createLogger(component: string): DebugLogger {
  return new DebugLogger(component);
}
