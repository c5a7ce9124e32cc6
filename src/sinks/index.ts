/**
 * Log Sinks
 */

export type { LogSink, NetworkLogRecord } from './log-sink.js';
export {
  FileLogSink,
  DEFAULT_LOG_DIR,
  formatFileTimestamp,
  sanitizeTestName,
  type FileLogSinkOptions,
} from './file-log-sink.js';
export { ConsoleLogSink } from './console-log-sink.js';
