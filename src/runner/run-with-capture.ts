/**
 * Runner-agnostic driver for the capture hooks.
 *
 * Calls beforeTest(), runs the body, then exactly one of afterTest() or
 * onTestException(). Body errors reach the caller unchanged.
 */

import type { CaptureLifecycle, TestContext } from '../capture/capture-lifecycle.js';

export async function runWithCapture<H, T>(
  lifecycle: CaptureLifecycle<H>,
  context: TestContext,
  body: () => T | Promise<T>
): Promise<T> {
  await lifecycle.beforeTest(context);

  let result: T;
  try {
    result = await body();
  } catch (error) {
    return lifecycle.onTestException(error);
  }

  await lifecycle.afterTest();
  return result;
}
