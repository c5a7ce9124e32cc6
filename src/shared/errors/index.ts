/**
 * Error Types
 */

export * from './capture.error.js';
