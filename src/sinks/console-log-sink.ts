/**
 * Console Log Sink
 *
 * Emits each captured line through the logging service, tagged with the
 * test name.
 */

import type { LogSink, NetworkLogRecord } from './log-sink.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

export class ConsoleLogSink implements LogSink {
  readonly name = 'console';

  constructor(private readonly logger: Logger = getLogger()) {}

  write(record: NetworkLogRecord): Promise<void> {
    for (const line of record.lines) {
      this.logger.info(line, { testName: record.testName });
    }
    return Promise.resolve();
  }
}
