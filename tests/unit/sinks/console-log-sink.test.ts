import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogSink } from '../../../src/sinks/console-log-sink.js';
import { LoggingService } from '../../../src/shared/services/logging.service.js';

describe('ConsoleLogSink', () => {
  it('should log each line at info level with the test name', async () => {
    const logger = new LoggingService('debug');
    const writer = vi.fn();
    logger.setWriter(writer);
    const sink = new ConsoleLogSink(logger);

    await sink.write({
      testName: 'search',
      lines: ['Request: [Method: GET, URL: https://x/]', 'No network requests were intercepted.'],
      startedAt: new Date(),
    });

    const entries = logger.getRecentLogs();
    expect(entries.map((entry) => [entry.level, entry.message, entry.context])).toEqual([
      ['info', 'Request: [Method: GET, URL: https://x/]', { testName: 'search' }],
      ['info', 'No network requests were intercepted.', { testName: 'search' }],
    ]);
    expect(writer).toHaveBeenCalledTimes(2);
  });

  it('should be named console', () => {
    expect(new ConsoleLogSink(new LoggingService()).name).toBe('console');
  });
});
