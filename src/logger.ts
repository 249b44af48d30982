import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import { LogLevelSchema, type LogEntry, type LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red.bold,
};

function levelFromEnv(): LogLevel {
  const parsed = LogLevelSchema.safeParse((process.env.DISPATCH_LOG_LEVEL ?? '').toLowerCase().trim());
  return parsed.success ? parsed.data : 'info';
}

export class DispatchLogger {
  private logs: LogEntry[] = [];
  private minLevel: LogLevel = levelFromEnv();
  private consoleOutputEnabled = true;
  private subscribers: Set<(entry: LogEntry) => void> = new Set();

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  subscribe(cb: (entry: LogEntry) => void): () => void {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  getLogs(): LogEntry[] {
    // Shallow copy so callers can't mutate logger state.
    return this.logs.slice();
  }

  clear() {
    this.logs = [];
  }

  debug(content: string, scope?: string, metadata?: Record<string, unknown>): LogEntry | undefined {
    return this.log({ level: 'debug', content, scope, metadata });
  }

  info(content: string, scope?: string, metadata?: Record<string, unknown>): LogEntry | undefined {
    return this.log({ level: 'info', content, scope, metadata });
  }

  warn(content: string, scope?: string, metadata?: Record<string, unknown>): LogEntry | undefined {
    return this.log({ level: 'warn', content, scope, metadata });
  }

  error(content: string, scope?: string, metadata?: Record<string, unknown>): LogEntry | undefined {
    return this.log({ level: 'error', content, scope, metadata });
  }

  /**
   * Record an entry and fan it out to subscribers and the console.
   *
   * Entries below the current level are discarded and `undefined` is returned.
   */
  log(entry: Omit<LogEntry, 'id' | 'timestamp'>): LogEntry | undefined {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.minLevel]) return undefined;

    const fullEntry: LogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    this.logs.push(fullEntry);

    for (const sub of this.subscribers) {
      try {
        sub(fullEntry);
      } catch (error) {
        // Never let log observers break the caller.
        console.error(`Log subscriber failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    if (this.consoleOutputEnabled) {
      console.log(this.format(fullEntry));
    }
    return fullEntry;
  }

  format(entry: LogEntry): string {
    const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const prefix = chalk.gray(`[${timeStr}]`);
    const levelStr = LEVEL_COLORS[entry.level](entry.level.toUpperCase().padEnd(5));
    const scopeStr = entry.scope ? ` ${chalk.hex('#FFA500')(`<${entry.scope}>`)}` : '';
    return `${prefix} ${levelStr}${scopeStr}: ${entry.content}`;
  }
}

export const logger = new DispatchLogger();
