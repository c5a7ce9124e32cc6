/**
 * Vitest Adapter
 *
 * Registers Vitest tests whose body runs under network capture and
 * receives the current browser session.
 *
 * @example
 * ```typescript
 * import { expect } from 'vitest';
 * import { captureTest } from 'e2e-netcapture/vitest';
 *
 * captureTest('search returns results', async ({ page }) => {
 *   await page.goto('https://example.com/');
 *   expect(page.url()).not.toContain('error');
 * });
 * ```
 */

import { test } from 'vitest';
import type { SessionHandle } from '../browser/session-factory.js';
import type { CaptureLifecycle } from '../capture/capture-lifecycle.js';
import { createLifecycleFromConfig } from '../config/capture-config.js';
import { runWithCapture } from './run-with-capture.js';

export interface CaptureTestOptions {
  /** Lifecycle to run under (default: built from NETCAPTURE_* environment variables) */
  lifecycle?: CaptureLifecycle<SessionHandle>;

  /** Test timeout in milliseconds */
  timeout?: number;
}

/**
 * Register a test running under `lifecycle`. A factory function is
 * called when the test starts, so setup errors fail that test only.
 */
export function captureTestWith<H>(
  lifecycle: CaptureLifecycle<H> | (() => CaptureLifecycle<H>),
  name: string,
  body: (session: H) => unknown,
  timeout?: number
): void {
  test(
    name,
    async (context) => {
      const active = typeof lifecycle === 'function' ? lifecycle() : lifecycle;
      await runWithCapture(active, { testName: context.task.name }, () =>
        body(active.sessionRegistry.requireCurrent())
      );
    },
    timeout
  );
}

/**
 * Register a test that launches Chrome through puppeteer-core.
 */
export function captureTest(
  name: string,
  body: (session: SessionHandle) => unknown,
  options: CaptureTestOptions = {}
): void {
  captureTestWith(options.lifecycle ?? (() => createLifecycleFromConfig()), name, body, options.timeout);
}
