/**
 * Tests for FileLogSink
 *
 * Writes into a fresh temporary directory per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_LOG_DIR,
  FileLogSink,
  formatFileTimestamp,
  sanitizeTestName,
} from '../../../src/sinks/file-log-sink.js';

// 2024-01-15 09:05:07 local time
const FIXED_NOW = new Date(2024, 0, 15, 9, 5, 7);

describe('formatFileTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatFileTimestamp(FIXED_NOW)).toBe('2024-01-15_09-05-07');
  });

  it('should format two-digit fields as is', () => {
    expect(formatFileTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('2023-12-31_23-59-58');
  });
});

describe('sanitizeTestName', () => {
  it('should keep letters, digits, dots, dashes and underscores', () => {
    expect(sanitizeTestName('checkout_v2.flow-A')).toBe('checkout_v2.flow-A');
  });

  it('should replace path separators and spaces', () => {
    expect(sanitizeTestName('Login page/should work')).toBe('Login_page_should_work');
  });

  it('should fall back for an empty name', () => {
    expect(sanitizeTestName('')).toBe('unknown-test');
  });
});

describe('FileLogSink', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'netcapture-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should default to the logs directory', () => {
    const sink = new FileLogSink();

    expect(DEFAULT_LOG_DIR).toBe('logs');
    expect(sink.resolvePath('search', FIXED_NOW)).toBe(
      join('logs', 'search_2024-01-15_09-05-07.log')
    );
  });

  it('should name the file after the test and its start time', () => {
    const sink = new FileLogSink({ directory });

    expect(sink.resolvePath('Login page/should work', FIXED_NOW)).toBe(
      join(directory, 'Login_page_should_work_2024-01-15_09-05-07.log')
    );
  });

  it('should write one line per entry', async () => {
    const sink = new FileLogSink({ directory });

    await sink.write({
      testName: 'search',
      lines: [
        'Request: [Method: GET, URL: https://x/]',
        'Response: [Status: 200, URL: https://x/, Content-Type: text/html]',
      ],
      startedAt: FIXED_NOW,
    });

    const content = await readFile(join(directory, 'search_2024-01-15_09-05-07.log'), 'utf8');
    expect(content).toBe(
      'Request: [Method: GET, URL: https://x/]\n' +
        'Response: [Status: 200, URL: https://x/, Content-Type: text/html]\n'
    );
  });

  it('should stamp the file with the capture start, not the write time', async () => {
    const sink = new FileLogSink({ directory });
    const startedAt = new Date(2023, 5, 1, 14, 30, 0);

    await sink.write({ testName: 'search', lines: ['line'], startedAt });

    expect(await readdir(directory)).toEqual(['search_2023-06-01_14-30-00.log']);
  });

  it('should create a missing directory', async () => {
    const nested = join(directory, 'nested', 'logs');
    const sink = new FileLogSink({ directory: nested });

    await sink.write({ testName: 'search', lines: ['line'], startedAt: FIXED_NOW });

    expect(await readdir(nested)).toEqual(['search_2024-01-15_09-05-07.log']);
  });

  it('should append when the same file is written twice', async () => {
    const sink = new FileLogSink({ directory });

    await sink.write({ testName: 'search', lines: ['first'], startedAt: FIXED_NOW });
    await sink.write({ testName: 'search', lines: ['second'], startedAt: FIXED_NOW });

    const content = await readFile(join(directory, 'search_2024-01-15_09-05-07.log'), 'utf8');
    expect(content).toBe('first\nsecond\n');
  });

  it('should reject when the directory cannot be created', async () => {
    const sink = new FileLogSink({ directory });
    await sink.write({ testName: 'blocker', lines: ['x'], startedAt: FIXED_NOW });
    // A regular file where a directory is expected
    const blocked = new FileLogSink({
      directory: join(directory, 'blocker_2024-01-15_09-05-07.log', 'sub'),
    });

    await expect(
      blocked.write({ testName: 'search', lines: ['x'], startedAt: FIXED_NOW })
    ).rejects.toThrow();
  });
});
