/**
 * Event Feed
 *
 * Push-based source of request/response notifications from a debug
 * channel. The CDP implementation listens to the Network domain and
 * reduces each event to the metadata kept in the capture log.
 */

import { z } from 'zod';
import type { CdpClient, CdpEventHandler } from '../cdp/cdp-client.interface.js';
import { getLogger } from '../shared/services/logging.service.js';
import {
  requestEvent,
  responseEvent,
  type RequestEvent,
  type ResponseEvent,
} from './network-event.js';

/** Removes a listener registered with onRequest/onResponse */
export type Unsubscribe = () => void;

export interface EventFeed<C = CdpClient> {
  /** Start event delivery on the channel */
  enable(channel: C): Promise<void>;
  onRequest(channel: C, callback: (event: RequestEvent) => void): Unsubscribe;
  onResponse(channel: C, callback: (event: ResponseEvent) => void): Unsubscribe;
}

// ===== CDP PAYLOADS =====

// Only the fields that end up in the log; the rest of the payload is ignored

export const RequestWillBeSentSchema = z.object({
  request: z.object({
    method: z.string().describe('HTTP method'),
    url: z.string().describe('Request URL without fragment'),
  }),
});

export const ResponseReceivedSchema = z.object({
  response: z.object({
    status: z.number().describe('HTTP status code'),
    url: z.string().describe('Response URL'),
    mimeType: z.string().describe('Resource MIME type as determined by the browser'),
  }),
});

export const REQUEST_EVENT = 'Network.requestWillBeSent';
export const RESPONSE_EVENT = 'Network.responseReceived';

/**
 * EventFeed over the CDP Network domain.
 */
export class CdpNetworkFeed implements EventFeed {
  private readonly logger = getLogger();

  async enable(channel: CdpClient): Promise<void> {
    await channel.send('Network.enable', {});
  }

  onRequest(channel: CdpClient, callback: (event: RequestEvent) => void): Unsubscribe {
    const handler: CdpEventHandler = (params) => {
      const parsed = RequestWillBeSentSchema.safeParse(params);
      if (!parsed.success) {
        this.logger.debug('Dropping malformed request event', { issues: parsed.error.issues });
        return;
      }
      const { method, url } = parsed.data.request;
      callback(requestEvent(method, url));
    };

    channel.on(REQUEST_EVENT, handler);
    return () => channel.off(REQUEST_EVENT, handler);
  }

  onResponse(channel: CdpClient, callback: (event: ResponseEvent) => void): Unsubscribe {
    const handler: CdpEventHandler = (params) => {
      const parsed = ResponseReceivedSchema.safeParse(params);
      if (!parsed.success) {
        this.logger.debug('Dropping malformed response event', { issues: parsed.error.issues });
        return;
      }
      const { status, url, mimeType } = parsed.data.response;
      callback(responseEvent(status, url, mimeType));
    };

    channel.on(RESPONSE_EVENT, handler);
    return () => channel.off(RESPONSE_EVENT, handler);
  }
}
