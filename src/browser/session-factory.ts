/**
 * Session Factory
 *
 * Creates and tears down the browser sessions used by network capture.
 * The capture lifecycle talks only to the SessionFactory interface, so
 * tests can substitute an in-process fake.
 */

import { randomUUID } from 'crypto';
import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import type { CdpClient, CdpClientOptions } from '../cdp/cdp-client.interface.js';
import { PuppeteerCdpClient } from '../cdp/puppeteer-cdp-client.js';
import { getLogger } from '../shared/services/logging.service.js';

export type { Browser, Page };

/**
 * Handle to one live browser-automation session
 */
export interface SessionHandle {
  /** Unique identifier for this session */
  session_id: string;

  /** Puppeteer Browser instance owning the session */
  browser: Browser;

  /** Page the test drives */
  page: Page;

  /** When the session was created */
  created_at: Date;
}

/**
 * Capability to start a session, open a debug channel against it, and tear it down.
 */
export interface SessionFactory<H = SessionHandle> {
  createSession(): Promise<H | null | undefined>;
  openDebugChannel(handle: H): Promise<CdpClient>;
  closeSession(handle: H): Promise<void>;
}

/**
 * Options for launching the browser
 */
export interface LaunchOptions {
  /** Run browser in headless mode (default: true) */
  headless?: boolean;

  /** Viewport dimensions (default: browser window size) */
  viewport?: { width: number; height: number };

  /** Chrome channel to use (ignored when executablePath is set) */
  channel?: 'chrome' | 'chrome-canary' | 'chrome-beta' | 'chrome-dev';

  /** Path to Chrome executable (overrides channel) */
  executablePath?: string;

  /** Additional Chrome command-line arguments */
  args?: string[];

  /** Options for CDP clients opened against the session */
  cdp?: CdpClientOptions;
}

/**
 * Launches one Chrome instance per session through puppeteer-core.
 */
export class PuppeteerSessionFactory implements SessionFactory {
  private readonly logger = getLogger();

  constructor(private readonly options: LaunchOptions = {}) {}

  async createSession(): Promise<SessionHandle> {
    const { headless = true, viewport, channel = 'chrome', executablePath, args = [] } = this.options;

    this.logger.info('Launching browser', { headless, channel, executablePath });

    const browser = await puppeteer.launch({
      channel: executablePath ? undefined : channel,
      executablePath,
      headless,
      defaultViewport: viewport ?? null,
      args: ['--disable-background-timer-throttling', ...args],
    });

    try {
      const page = await browser.newPage();
      const handle: SessionHandle = {
        session_id: `session-${randomUUID()}`,
        browser,
        page,
        created_at: new Date(),
      };
      this.logger.debug('Session created', { session_id: handle.session_id });
      return handle;
    } catch (error) {
      // Browser is useless without a page
      await browser.close().catch((closeError: unknown) => {
        this.logger.debug('Browser close failed after page creation error', {
          error: closeError instanceof Error ? closeError.message : String(closeError),
        });
      });
      throw error;
    }
  }

  async openDebugChannel(handle: SessionHandle): Promise<CdpClient> {
    const session = await handle.page.createCDPSession();
    return new PuppeteerCdpClient(session, this.options.cdp);
  }

  async closeSession(handle: SessionHandle): Promise<void> {
    await handle.browser.close();
    this.logger.debug('Session closed', { session_id: handle.session_id });
  }
}
