/**
 * e2e-netcapture
 *
 * Session registry and network capture lifecycle for browser-driven
 * end-to-end tests.
 */

// Registry
export {
  SessionRegistry,
  getSessionRegistry,
  resetSessionRegistry,
} from './registry/session-registry.js';

// Browser sessions
export * from './browser/index.js';

// Capture
export * from './capture/index.js';

// Sinks
export * from './sinks/index.js';

// CDP
export * from './cdp/index.js';

// Configuration
export {
  CaptureEnvSchema,
  loadCaptureConfig,
  createSinkFromConfig,
  createLifecycleFromConfig,
  type CaptureConfig,
} from './config/capture-config.js';

// Runner integration
export { runWithCapture } from './runner/run-with-capture.js';

// Errors and logging
export * from './shared/errors/index.js';
export { extractErrorMessage, toError } from './lib/error-message.js';
export {
  LoggingService,
  getLogger,
  setLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogWriter,
} from './shared/services/logging.service.js';
