/**
 * Capture Errors
 *
 * Standardized error classification for session registry and network
 * capture operations. Provides error codes for programmatic handling and
 * detailed messages for debugging.
 */

/**
 * Error codes for capture operations
 */
export type CaptureErrorCode =
  | 'INVALID_KEY'
  | 'SESSION_INIT_FAILED'
  | 'SINK_WRITE_FAILED'
  | 'NO_CURRENT_SESSION'
  | 'INVALID_STATE'
  | 'INVALID_CONFIG';

/**
 * Base error for capture operations.
 *
 * @example
 * ```typescript
 * try {
 *   await lifecycle.beforeTest({ testName: 'checkout' });
 * } catch (error) {
 *   if (CaptureError.isCaptureError(error)) {
 *     switch (error.code) {
 *       case 'SESSION_INIT_FAILED':
 *         console.log('Browser could not be started');
 *         break;
 *       case 'INVALID_STATE':
 *         console.log('Previous test was never finished');
 *         break;
 *     }
 *   }
 * }
 * ```
 */
export class CaptureError extends Error {
  /**
   * Error code for programmatic handling
   */
  readonly code: CaptureErrorCode;

  /**
   * Original error that caused this error (if any)
   */
  readonly cause?: Error;

  /**
   * Additional context for debugging
   */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: CaptureErrorCode,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CaptureError';
    this.code = code;
    this.cause = cause;
    this.context = context;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a JSON-serializable representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }

  /**
   * Type guard to check if an error is a CaptureError
   */
  static isCaptureError(error: unknown): error is CaptureError {
    return error instanceof CaptureError;
  }
}

/**
 * Registry operation called with an empty or missing key.
 */
export class InvalidKeyError extends CaptureError {
  constructor(operation: string, context?: Record<string, unknown>) {
    super(`Registry key must be a non-empty string (operation: ${operation})`, 'INVALID_KEY', undefined, {
      operation,
      ...context,
    });
    this.name = 'InvalidKeyError';
  }
}

/**
 * Session creation, debug channel open, or feed listener registration failed.
 */
export class SessionInitError extends CaptureError {
  constructor(stage: string, cause?: Error, context?: Record<string, unknown>) {
    super(
      cause
        ? `Failed to initialize browser session (${stage}): ${cause.message}`
        : `Failed to initialize browser session (${stage})`,
      'SESSION_INIT_FAILED',
      cause,
      { stage, ...context }
    );
    this.name = 'SessionInitError';
  }
}

/**
 * Captured events could not be written to the log sink.
 */
export class SinkWriteError extends CaptureError {
  constructor(sink: string, cause: Error, context?: Record<string, unknown>) {
    super(`Failed to write network logs to ${sink}: ${cause.message}`, 'SINK_WRITE_FAILED', cause, {
      sink,
      ...context,
    });
    this.name = 'SinkWriteError';
  }
}

/**
 * No session has been marked as current.
 */
export class NoCurrentSessionError extends CaptureError {
  constructor(context?: Record<string, unknown>) {
    super(
      'No current browser session. Is the test wrapped with network capture?',
      'NO_CURRENT_SESSION',
      undefined,
      context
    );
    this.name = 'NoCurrentSessionError';
  }
}

/**
 * Lifecycle hook invoked in a state that does not accept it.
 */
export class CaptureStateError extends CaptureError {
  constructor(currentState: string, attemptedOperation: string, context?: Record<string, unknown>) {
    super(
      `Invalid operation "${attemptedOperation}" in state "${currentState}"`,
      'INVALID_STATE',
      undefined,
      { currentState, attemptedOperation, ...context }
    );
    this.name = 'CaptureStateError';
  }
}

/**
 * Configuration values failed validation.
 */
export class ConfigError extends CaptureError {
  constructor(issues: string[], context?: Record<string, unknown>) {
    super(`Invalid capture configuration: ${issues.join('; ')}`, 'INVALID_CONFIG', undefined, {
      issues,
      ...context,
    });
    this.name = 'ConfigError';
  }
}
