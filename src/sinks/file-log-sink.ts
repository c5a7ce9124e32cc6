/**
 * File Log Sink
 *
 * Writes each test's network log to its own file:
 * `<logDir>/<testName>_<yyyy-MM-dd_HH-mm-ss>.log`.
 */

import { appendFile, mkdir } from 'fs/promises';
import { join } from 'path';
import type { LogSink, NetworkLogRecord } from './log-sink.js';
import { getLogger } from '../shared/services/logging.service.js';

/** Default directory for log files, relative to the working directory */
export const DEFAULT_LOG_DIR = 'logs';

export interface FileLogSinkOptions {
  /** Directory for log files (created on demand) */
  directory?: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Sortable local timestamp: `yyyy-MM-dd_HH-mm-ss`.
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Make a test name safe to use as a file name.
 */
export function sanitizeTestName(testName: string): string {
  const safe = testName.replace(/[^A-Za-z0-9._-]/g, '_');
  return safe.length > 0 ? safe : 'unknown-test';
}

export class FileLogSink implements LogSink {
  readonly name = 'file';
  private readonly directory: string;
  private readonly logger = getLogger();

  constructor(options: FileLogSinkOptions = {}) {
    this.directory = options.directory ?? DEFAULT_LOG_DIR;
  }

  /**
   * Log file for a test whose capture started at `startedAt`.
   */
  resolvePath(testName: string, startedAt: Date): string {
    return join(
      this.directory,
      `${sanitizeTestName(testName)}_${formatFileTimestamp(startedAt)}.log`
    );
  }

  async write(record: NetworkLogRecord): Promise<void> {
    const filepath = this.resolvePath(record.testName, record.startedAt);

    await mkdir(this.directory, { recursive: true });
    await appendFile(filepath, record.lines.map((line) => `${line}\n`).join(''), 'utf8');

    this.logger.debug('Network log written', {
      testName: record.testName,
      path: filepath,
      lines: record.lines.length,
    });
  }
}
