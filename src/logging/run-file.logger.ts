import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { stripVTControlCharacters } from 'node:util';

export const DEFAULT_LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log'];
export const DEBUG_LOG_LEVELS: LogLevel[] = [...DEFAULT_LOG_LEVELS, 'debug', 'verbose'];

/**
 * Per-run log file name: `<mode>_<date>_<range|time>_<pid>.log`.
 */
export function runLogFileName(
  mode: string,
  date: string,
  rangeOrTime: string,
  pid: number,
): string {
  return `${mode}_${date}_${rangeOrTime}_${pid}.log`;
}

/**
 * RunFileLogger - Nest console logger that also mirrors every printed line
 * into the log file of the unit currently running, so each ledger row
 * points at the log of exactly that run.
 */
@Injectable()
export class RunFileLogger extends ConsoleLogger {
  private runLogPath: string | null = null;

  constructor() {
    super('', { logLevels: DEFAULT_LOG_LEVELS });
  }

  /**
   * Start mirroring into `filePath` (created with its directory), or stop
   * with null.
   */
  attachRunFile(filePath: string | null): void {
    if (filePath) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.runLogPath = filePath;
  }

  get currentRunFile(): string | null {
    return this.runLogPath;
  }

  protected formatMessage(
    logLevel: LogLevel,
    message: unknown,
    pidMessage: string,
    formattedLogLevel: string,
    contextMessage: string,
    timestampDiff: string,
  ): string {
    const line = super.formatMessage(
      logLevel,
      message,
      pidMessage,
      formattedLogLevel,
      contextMessage,
      timestampDiff,
    );
    this.mirror(line);
    return line;
  }

  protected printStackTrace(stack: string): void {
    super.printStackTrace(stack);
    if (stack) this.mirror(`${stack}\n`);
  }

  private mirror(text: string): void {
    if (!this.runLogPath) return;
    fs.appendFileSync(this.runLogPath, stripVTControlCharacters(text), 'utf-8');
  }
}
