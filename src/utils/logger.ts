import chalk from 'chalk';
import dayjs from 'dayjs';
import { isAxiosError } from 'axios';

function timestamp(): string {
  // Local time in a readable format
  return dayjs().format('YYYY-MM-DD HH:mm:ss');
}

function debugEnabled(): boolean {
  const ll = (process.env.LOG_LEVEL || '').toLowerCase();
  const dbg = (process.env.DEBUG || '').toLowerCase();
  return ll === 'debug' || dbg === '1' || dbg === 'true' || dbg === 'yes' || dbg === 'on';
}

function preview(value: unknown, max = 300): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else {
    try {
      text = JSON.stringify(value, null, 2);
    } catch {
      text = String(value);
    }
  }
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export class Logger {
  static info(message: string): void {
    console.log(`${timestamp()} ${chalk.blueBright('[INFO]')} ${message}`);
  }

  static warn(message: string): void {
    console.warn(`${timestamp()} ${chalk.yellow('[WARN]')} ${message}`);
  }

  static error(message: string, err?: unknown): void {
    let detail = '';
    if (err instanceof Error) {
      detail = `\n${err.name}: ${err.message}`;

      if (isAxiosError(err) && err.response) {
        detail += `\nHTTP Status: ${err.response.status}`;
        if (err.response.data !== undefined && err.response.data !== '') {
          detail += `\nResponse Body: ${preview(err.response.data)}`;
        }
      }

      if (err.stack) {
        detail += `\n${err.stack}`;
      }
    } else if (err !== undefined) {
      detail = `\n${preview(err)}`;
    }
    console.error(`${timestamp()} ${chalk.red('[ERROR]')} ${message}${detail}`);
  }

  static debug(message: string): void {
    // Only emit debug logs when LOG_LEVEL=debug or DEBUG is truthy
    if (!debugEnabled()) return;
    console.debug(`${timestamp()} ${chalk.gray(message)}`);
  }
}

// Short single-line form of an error, for retry/skip log lines
export function describeError(err: unknown, max = 100): string {
  const msg = err instanceof Error ? err.message : String(err);
  return msg.length > max ? msg.slice(0, max) : msg;
}
