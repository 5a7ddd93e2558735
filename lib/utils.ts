/**
 * Utility functions
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export class Logger {
  static minLevel(): LogLevel {
    const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(configured) ? configured : 'info';
  }

  static log(level: LogLevel, message: string, obj?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel()]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...(obj !== undefined && { data: obj }),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, obj?: unknown) {
    this.log('info', message, obj);
  }

  static warn(message: string, obj?: unknown) {
    this.log('warn', message, obj);
  }

  static error(message: string, obj?: unknown) {
    this.log('error', message, obj);
  }

  static debug(message: string, obj?: unknown) {
    this.log('debug', message, obj);
  }
}

export class Crypto {
  static sha256(input: string | Buffer): string {
    return createHash('sha256').update(input).digest('hex');
  }

  static uuid(): string {
    return uuidv4();
  }
}

export class Clock {
  static nowUtc(): Date {
    return new Date();
  }

  static addHours(date: Date, hours: number): Date {
    return new Date(date.getTime() + hours * 60 * 60 * 1000);
  }

  /**
   * Run timestamp used in snapshot file names: YYYYMMDD_HHMMSS (UTC)
   */
  static runTimestamp(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, '0');
    return (
      `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
      `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
    );
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    delayMs?: number;
    backoff?: boolean;
    onError?: (error: Error, attempt: number) => void;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoff = true,
    onError,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (onError) {
        onError(lastError, attempt);
      }

      if (attempt < maxRetries) {
        const delay = backoff ? delayMs * Math.pow(2, attempt - 1) : delayMs;
        Logger.warn(`Retry attempt ${attempt}/${maxRetries} after ${delay}ms`, {
          error: lastError.message,
        });
        await sleep(delay);
      }
    }
  }

  throw lastError || new Error('Max retries exceeded');
}

export function cleanText(text: unknown): string {
  if (!text || typeof text !== 'string') {
    return '';
  }
  return text
    .replace(/\s+/g, ' ')
    .trim();
}

export function estimateReadingTime(text: string, wpm = 150): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.ceil((words / wpm) * 60); // seconds
}
