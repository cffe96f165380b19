import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RunEvent {
  level: LogLevel;
  event: string;
  message: string;
  screen?: string;
  element?: string;
  [field: string]: unknown;
}

export interface EventLogger {
  log(event: RunEvent): Promise<void>;
}

export const silentLogger: EventLogger = {
  async log(): Promise<void> {},
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export interface RunLoggerOptions {
  minLevel?: LogLevel;
}

/**
 * Appends run events as JSON lines to `<runDir>/logs.jsonl`.
 */
export class RunLogger implements EventLogger {
  private logPath: string;
  private minLevel: LogLevel;
  private initialized = false;

  constructor(
    private runDir: string,
    options: RunLoggerOptions = {},
  ) {
    this.logPath = join(runDir, 'logs.jsonl');
    this.minLevel = options.minLevel ?? 'info';
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async log(event: RunEvent): Promise<void> {
    if (!isLevelEnabled(event.level, this.minLevel)) return;

    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...event,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  getRunDir(): string {
    return this.runDir;
  }

  getLogPath(): string {
    return this.logPath;
  }
}
