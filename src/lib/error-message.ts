/**
 * Error message helpers for values thrown by browsers, sinks and test bodies.
 */

/**
 * Extract a meaningful error message from any thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown Error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object') {
    // Check common error-like properties
    const obj = error as Record<string, unknown>;
    if (typeof obj.message === 'string') return obj.message;
    if (typeof obj.error === 'string') return obj.error;
    if (typeof obj.reason === 'string') return obj.reason;
    // Try to stringify, but handle circular refs
    try {
      const str = JSON.stringify(error);
      return str !== '{}' ? str : `Unknown error object: ${Object.keys(obj).join(', ') || 'empty'}`;
    } catch {
      return `Non-serializable error: ${Object.prototype.toString.call(error)}`;
    }
  }
  return String(error);
}

/**
 * Return `error` itself if it is an Error, otherwise wrap its message.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(extractErrorMessage(error));
}
