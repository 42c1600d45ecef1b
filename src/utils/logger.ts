import * as fs from 'fs';
import * as path from 'path';
import { getConfig } from '../config';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

type LogData = Record<string, unknown>;

// Set once a write fails; logging stays off for the rest of the process.
let sinkBroken = false;

export class Logger {
  private component: string;

  private constructor(component: string) {
    this.component = component;
  }

  static create(component: string): Logger {
    return new Logger(component);
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
    return `${timestamp} ${level.padEnd(5)} | [${this.component}] ${message}${dataStr}`;
  }

  private writeLog(level: LogLevel, message: string, data?: LogData): void {
    const { logFile } = getConfig();
    if (!logFile || sinkBroken) return;

    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      fs.appendFileSync(logFile, this.formatMessage(level, message, data) + '\n', 'utf8');
    } catch (error) {
      sinkBroken = true;
      console.error(`Debug logging disabled, cannot write ${logFile}:`, error);
    }
  }

  debug(message: string, data?: LogData): void {
    if (getConfig().debug) {
      this.writeLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: LogData): void {
    this.writeLog('INFO', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.writeLog('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    const errorData: LogData = { ...data };
    if (error instanceof Error) {
      errorData.error = error.message;
      errorData.stack = error.stack;
    } else if (error !== undefined) {
      errorData.error = String(error);
    }
    this.writeLog('ERROR', message, errorData);
  }

  /**
   * Log lifecycle events with consistent narrative structure
   */
  lifecycle(event: string, details?: LogData): void {
    this.info(`Lifecycle: ${event}`, details);
  }

  /**
   * Log decision points
   */
  decision(description: string, choice: string, reason?: string): void {
    this.info(`Decision: ${description}`, { choice, reason });
  }
}

/**
 * Re-enable a log sink that failed earlier
 */
export function resetLogSink(): void {
  sinkBroken = false;
}
