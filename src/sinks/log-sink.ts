/**
 * Log Sink
 *
 * Destination for the network log of one test execution.
 */

export interface NetworkLogRecord {
  /** Name of the test the log belongs to */
  testName: string;

  /** Rendered log lines in capture order */
  lines: readonly string[];

  /** When the test's capture started */
  startedAt: Date;
}

export interface LogSink {
  /** Short label used in error reports (e.g. 'file', 'console') */
  readonly name: string;

  /**
   * Persist or emit one test's log.
   *
   * @throws Error if the log could not be written
   */
  write(record: NetworkLogRecord): Promise<void>;
}
