import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  runId: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

/** The narrow logging surface components depend on. */
export interface EventLogger {
  log(level: LogLevel, event: string, data?: Record<string, unknown>): Promise<void>;
}

export class RunLogger implements EventLogger {
  private logPath: string;
  private initialized = false;
  private listeners: ((entry: LogEntry) => void)[] = [];

  constructor(
    private runDir: string,
    private runId: string,
  ) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  /** Mirror every entry somewhere else as well, e.g. stdout for the CLI. */
  onEntry(listener: (entry: LogEntry) => void): void {
    this.listeners.push(listener);
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    await this.ensureDir();
    const entry: LogEntry = {
      ...data,
      timestamp: new Date().toISOString(),
      runId: this.runId,
      level,
      event,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    for (const listener of this.listeners) listener(entry);
  }

  async info(event: string, data?: Record<string, unknown>): Promise<void> {
    await this.log('info', event, data);
  }

  async warn(event: string, data?: Record<string, unknown>): Promise<void> {
    await this.log('warn', event, data);
  }

  async error(event: string, data?: Record<string, unknown>): Promise<void> {
    await this.log('error', event, data);
  }

  async saveDomSnapshot(name: string, html: string): Promise<string> {
    await this.ensureDir();
    const filePath = join(this.runDir, `dom_${name}.html`);
    await writeFile(filePath, html, 'utf-8');
    return filePath;
  }

  getRunDir(): string {
    return this.runDir;
  }
}

/** Logger that drops everything; for callers that run without a run directory. */
export const silentLogger: EventLogger = {
  async log() {
    return;
  },
};
