/**
 * NDJSON Logger
 * Non-blocking logging to file with structured events
 */

import fs from 'fs';
import path from 'path';

export type LogEvent =
  | 'server_start'
  | 'server_stop'
  | 'http_request'
  | 'analysis_request'
  | 'analysis_complete'
  | 'analysis_fallback'
  | 'provider_response'
  | 'transcribe'
  | 'voice_clone'
  | 'voice_synthesize'
  | 'error';

export interface LogEntry {
  timestamp: number;
  event: LogEvent;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** File to append NDJSON events to; null disables the event file */
  logPath: string | null;
  debug?: boolean;
  /** Mirror info/warn/error/debug to the console (default true) */
  console?: boolean;
}

export class Logger {
  private fd: number | null = null;
  private queue: string[] = [];
  private writing = false;
  private idleWaiters: Array<() => void> = [];
  private readonly logPath: string | null;
  private readonly debugEnabled: boolean;
  private readonly consoleEnabled: boolean;

  constructor(options: LoggerOptions) {
    this.logPath = options.logPath;
    this.debugEnabled = options.debug ?? false;
    this.consoleEnabled = options.console ?? true;
    if (this.logPath) {
      this.ensureDir(this.logPath);
      this.open(this.logPath);
    }
  }

  private ensureDir(logPath: string): void {
    const dir = path.dirname(logPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  private open(logPath: string): void {
    try {
      this.fd = fs.openSync(logPath, 'a');
    } catch (err) {
      console.error('[Logger] Failed to open log file:', err);
    }
  }

  log(event: LogEvent, data?: Record<string, unknown>): void {
    // Per-request lines only in DEBUG mode
    if (event === 'http_request' && !this.debugEnabled) {
      return;
    }

    if (this.fd === null) {
      return;
    }

    const entry: LogEntry = {
      timestamp: Date.now(),
      event,
      data,
    };

    this.queue.push(JSON.stringify(entry) + '\n');

    // Non-blocking write
    if (!this.writing) {
      this.flush();
    }
  }

  private flush(): void {
    if (this.fd === null || this.queue.length === 0) {
      this.markIdle();
      return;
    }

    this.writing = true;
    const batch = this.queue.splice(0, 100).join('');

    fs.write(this.fd, batch, (err) => {
      if (err) {
        console.error('[Logger] Write error:', err);
      }
      if (this.queue.length > 0) {
        setImmediate(() => this.flush());
      } else {
        this.markIdle();
      }
    });
  }

  private markIdle(): void {
    this.writing = false;
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) resolve();
  }

  /**
   * Wait for the in-flight batch, write what is left and close the file
   */
  async close(): Promise<void> {
    if (this.writing) {
      await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
    }
    if (this.fd !== null) {
      // Flush remaining synchronously
      if (this.queue.length > 0) {
        fs.writeSync(this.fd, this.queue.join(''));
        this.queue = [];
      }
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  // Console logging helpers
  info(msg: string, data?: Record<string, unknown>): void {
    if (this.consoleEnabled) {
      console.log(`[Gateway] ${msg}`, data ? JSON.stringify(data) : '');
    }
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    if (this.consoleEnabled) {
      console.warn(`[Gateway] ⚠️ ${msg}`, data ? JSON.stringify(data) : '');
    }
  }

  error(msg: string, data?: Record<string, unknown>): void {
    if (this.consoleEnabled) {
      console.error(`[Gateway] ❌ ${msg}`, data ? JSON.stringify(data) : '');
    }
    this.log('error', { message: msg, ...data });
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (this.debugEnabled && this.consoleEnabled) {
      console.log(`[Gateway] 🔍 ${msg}`, data ? JSON.stringify(data) : '');
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
