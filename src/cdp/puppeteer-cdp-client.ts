/**
 * Puppeteer CDP Client
 *
 * CdpClient implementation wrapping puppeteer-core's CDPSession.
 */

import type { CDPSession } from 'puppeteer-core';
import type { CdpClient, CdpEventHandler, CdpClientOptions } from './cdp-client.interface.js';
import { getLogger } from '../shared/services/logging.service.js';

/** Error fragments that mean the underlying target is gone */
const DISCONNECT_MARKERS = ['Target closed', 'Session closed', 'detached'];

/**
 * CdpClient implementation wrapping puppeteer-core's CDPSession.
 *
 * @example
 * ```typescript
 * const page = await browser.newPage();
 * const cdp = new PuppeteerCdpClient(await page.createCDPSession());
 *
 * await cdp.send('Network.enable', {});
 * cdp.on('Network.responseReceived', (params) => console.log(params));
 * ```
 */
export class PuppeteerCdpClient implements CdpClient {
  private active = true;
  private readonly logger = getLogger();
  private readonly timeout: number;
  private readonly eventHandlers = new Map<string, Set<CdpEventHandler>>();

  constructor(
    private readonly session: CDPSession,
    options: CdpClientOptions = {}
  ) {
    this.timeout = options.timeout ?? 30000;
  }

  /**
   * Send a CDP command and wait for response.
   */
  async send<T = unknown>(method: string, params?: Record<string, unknown>): Promise<T> {
    if (!this.active) {
      throw new Error('CDP session is closed');
    }

    if (!method.includes('.')) {
      throw new Error(`Invalid CDP method format: "${method}". Expected "Domain.method" format.`);
    }

    let timeoutId: NodeJS.Timeout | undefined;

    try {
      // CDPSession.send() is keyed on ProtocolMapping; any method name is accepted here
      const result = await Promise.race([
        this.session.send(
          method as Parameters<CDPSession['send']>[0],
          params as Parameters<CDPSession['send']>[1]
        ),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(() => {
            reject(new Error(`CDP command timed out after ${this.timeout}ms: ${method}`));
          }, this.timeout);
        }),
      ]);

      return result as T;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      if (DISCONNECT_MARKERS.some((marker) => errorMessage.includes(marker))) {
        this.active = false;
      }

      this.logger.error(`CDP command failed: ${method}`, error instanceof Error ? error : undefined);
      throw error;
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  on(event: string, handler: CdpEventHandler): void {
    // Track handler for cleanup on close()
    let handlers = this.eventHandlers.get(event);
    if (!handlers) {
      handlers = new Set();
      this.eventHandlers.set(event, handlers);
    }
    handlers.add(handler);

    this.session.on(event as Parameters<CDPSession['on']>[0], handler as () => void);
  }

  off(event: string, handler: CdpEventHandler): void {
    const handlers = this.eventHandlers.get(event);
    handlers?.delete(handler);
    if (handlers?.size === 0) {
      this.eventHandlers.delete(event);
    }

    this.session.off(event as Parameters<CDPSession['off']>[0], handler as () => void);
  }

  once(event: string, handler: CdpEventHandler): void {
    const wrappedHandler = (params: Record<string, unknown>) => {
      this.off(event, wrappedHandler);
      handler(params);
    };
    this.on(event, wrappedHandler);
  }

  /**
   * Remove tracked handlers and detach the session.
   */
  async close(): Promise<void> {
    if (!this.active) {
      return;
    }

    try {
      this.removeAllEventHandlers();
      await this.session.detach();
    } catch (error) {
      // Session may already be detached
      this.logger.debug('Error detaching CDP session (may already be detached)', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.active = false;
      this.eventHandlers.clear();
    }
  }

  isActive(): boolean {
    return this.active;
  }

  private removeAllEventHandlers(): void {
    for (const [event, handlers] of this.eventHandlers) {
      for (const handler of handlers) {
        this.session.off(event as Parameters<CDPSession['off']>[0], handler as () => void);
      }
    }
  }
}
