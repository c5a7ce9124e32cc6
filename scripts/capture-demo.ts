#!/usr/bin/env npx tsx
/**
 * Network Capture Demo
 *
 * Runs one "test" against a live site under network capture:
 * 1. Launches Chrome through the configured lifecycle
 * 2. Navigates the current session's page
 * 3. Writes the captured request/response log
 *
 * Needs a local Chrome (see NETCAPTURE_CHANNEL / NETCAPTURE_EXECUTABLE_PATH).
 *
 * Run: npx tsx scripts/capture-demo.ts [url]
 */

import { createLifecycleFromConfig, loadCaptureConfig } from '../src/config/capture-config.js';
import { runWithCapture } from '../src/runner/run-with-capture.js';

async function main(): Promise<void> {
  const url = process.argv[2] ?? 'https://example.com/';
  const config = loadCaptureConfig();
  const lifecycle = createLifecycleFromConfig(config);

  lifecycle.onStateChange(({ previousState, currentState }) => {
    console.log(`   ${previousState} -> ${currentState}`);
  });

  console.log(`🚀 Capturing traffic for ${url}`);

  await runWithCapture(lifecycle, { testName: 'capture-demo' }, async () => {
    const { page } = lifecycle.sessionRegistry.requireCurrent();
    await page.goto(url, { waitUntil: 'networkidle2' });
    console.log(`📄 Loaded: ${await page.title()}`);
    console.log(`🔍 Events so far: ${lifecycle.getCapturedEvents().length}`);
  });

  if (config.sink === 'file') {
    console.log(`\n✅ Log written to ${config.logDir}/capture-demo_<timestamp>.log`);
  } else {
    console.log('\n✅ Log written to stderr');
  }
}

main().catch((error: unknown) => {
  console.error('❌ Demo failed:', error);
  process.exit(1);
});
