/**
 * Browser Module
 *
 * Exports for browser session creation and teardown.
 */

export {
  PuppeteerSessionFactory,
  type SessionFactory,
  type SessionHandle,
  type LaunchOptions,
  type Browser,
  type Page,
} from './session-factory.js';
