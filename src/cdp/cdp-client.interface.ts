/**
 * CDP Client Interface
 *
 * Generic interface for Chrome DevTools Protocol communication.
 * Lets the capture layer subscribe to browser events without depending
 * on the underlying transport (puppeteer-core, a mock in tests, etc.).
 */

import type { Protocol } from 'devtools-protocol';

/**
 * Handler function for CDP events
 */
export type CdpEventHandler<T = Record<string, unknown>> = (params: T) => void;

/**
 * CDP method signatures used by the capture layer.
 * Extend this map to add more typed methods.
 */
export interface CdpMethodMap {
  'Network.enable': {
    params: Protocol.Network.EnableRequest;
    result: void;
  };
}

/**
 * Generic interface for CDP communication.
 */
export interface CdpClient {
  /**
   * Send a CDP command and wait for response.
   *
   * @param method - CDP method name (e.g., 'Network.enable')
   * @param params - Optional parameters for the CDP method
   * @throws Error if session is closed or CDP command fails
   *
   * @example
   * ```typescript
   * await cdp.send('Network.enable', {});
   * ```
   */
  send<M extends keyof CdpMethodMap>(
    method: M,
    params?: CdpMethodMap[M]['params']
  ): Promise<CdpMethodMap[M]['result']>;
  send<T = unknown>(method: string, params?: Record<string, unknown>): Promise<T>;

  /**
   * Subscribe to CDP events.
   *
   * @example
   * ```typescript
   * cdp.on('Network.requestWillBeSent', (params) => {
   *   console.log('Request:', params);
   * });
   * ```
   */
  on(event: string, handler: CdpEventHandler): void;

  /**
   * Unsubscribe from CDP events.
   *
   * @param handler - The same handler function passed to `on()`
   */
  off(event: string, handler: CdpEventHandler): void;

  /**
   * Subscribe to a CDP event once (auto-unsubscribes after first fire).
   */
  once(event: string, handler: CdpEventHandler): void;

  /**
   * Close/detach the CDP session.
   * After calling close(), all subsequent send() calls will throw.
   */
  close(): Promise<void>;

  /**
   * Check if session is still active.
   */
  isActive(): boolean;
}

/**
 * Options for creating a CDP client
 */
export interface CdpClientOptions {
  /** Timeout for CDP commands in milliseconds (default: 30000) */
  timeout?: number;
}
