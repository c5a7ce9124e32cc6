/**
 * Capture Configuration
 *
 * Reads network capture settings from environment variables and builds
 * the default lifecycle from them.
 *
 * | Variable                     | Default  |
 * | ---------------------------- | -------- |
 * | NETCAPTURE_SINK              | file     |
 * | NETCAPTURE_LOG_DIR           | logs     |
 * | NETCAPTURE_HEADLESS          | true     |
 * | NETCAPTURE_CHANNEL           | (chrome) |
 * | NETCAPTURE_EXECUTABLE_PATH   |          |
 * | NETCAPTURE_REGISTRY_KEY      |          |
 */

import { z } from 'zod';
import { PuppeteerSessionFactory, type SessionHandle } from '../browser/session-factory.js';
import { CaptureLifecycle, type CaptureLifecycleOptions } from '../capture/capture-lifecycle.js';
import { getSessionRegistry } from '../registry/session-registry.js';
import { ConsoleLogSink } from '../sinks/console-log-sink.js';
import { DEFAULT_LOG_DIR, FileLogSink } from '../sinks/file-log-sink.js';
import type { LogSink } from '../sinks/log-sink.js';
import { ConfigError } from '../shared/errors/capture.error.js';

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const CaptureEnvSchema = z.object({
  NETCAPTURE_SINK: z.enum(['file', 'console']).default('file').describe('Log sink'),
  NETCAPTURE_LOG_DIR: z.string().default(DEFAULT_LOG_DIR).describe('Directory for log files'),
  NETCAPTURE_HEADLESS: BooleanFlagSchema.default('true').describe('Run Chrome headless'),
  NETCAPTURE_CHANNEL: z
    .enum(['chrome', 'chrome-canary', 'chrome-beta', 'chrome-dev'])
    .optional()
    .describe('Installed Chrome channel to launch'),
  NETCAPTURE_EXECUTABLE_PATH: z.string().optional().describe('Chrome executable (overrides channel)'),
  NETCAPTURE_REGISTRY_KEY: z
    .string()
    .optional()
    .describe('Registry key the session is also stored under'),
});

/**
 * Validated capture settings
 */
export interface CaptureConfig {
  sink: 'file' | 'console';
  logDir: string;
  headless: boolean;
  channel?: 'chrome' | 'chrome-canary' | 'chrome-beta' | 'chrome-dev';
  executablePath?: string;
  registryKey?: string;
}

/**
 * Parse capture settings from an environment map.
 * Empty variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadCaptureConfig(env: NodeJS.ProcessEnv = process.env): CaptureConfig {
  const defined: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (name.startsWith('NETCAPTURE_') && value !== undefined && value !== '') {
      defined[name] = value;
    }
  }

  const parsed = CaptureEnvSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    sink: vars.NETCAPTURE_SINK,
    logDir: vars.NETCAPTURE_LOG_DIR,
    headless: vars.NETCAPTURE_HEADLESS,
    channel: vars.NETCAPTURE_CHANNEL,
    executablePath: vars.NETCAPTURE_EXECUTABLE_PATH,
    registryKey: vars.NETCAPTURE_REGISTRY_KEY,
  };
}

export function createSinkFromConfig(config: CaptureConfig): LogSink {
  return config.sink === 'console'
    ? new ConsoleLogSink()
    : new FileLogSink({ directory: config.logDir });
}

/**
 * Build a lifecycle that launches Chrome through puppeteer-core and
 * publishes sessions to the process-wide registry.
 *
 * @param overrides - replace any of the pieces derived from config
 */
export function createLifecycleFromConfig(
  config: CaptureConfig = loadCaptureConfig(),
  overrides: Partial<CaptureLifecycleOptions<SessionHandle>> = {}
): CaptureLifecycle<SessionHandle> {
  return new CaptureLifecycle<SessionHandle>({
    factory: new PuppeteerSessionFactory({
      headless: config.headless,
      channel: config.channel,
      executablePath: config.executablePath,
    }),
    registry: getSessionRegistry(),
    sink: createSinkFromConfig(config),
    registryKey: config.registryKey,
    ...overrides,
  });
}
