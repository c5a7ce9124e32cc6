/**
 * Tests for CdpNetworkFeed
 *
 * Network events are pushed through MockCdpClient and must arrive as
 * RequestEvent / ResponseEvent values.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CdpNetworkFeed,
  REQUEST_EVENT,
  RESPONSE_EVENT,
} from '../../../src/capture/event-feed.js';
import type { RequestEvent, ResponseEvent } from '../../../src/capture/network-event.js';
import { MockCdpClient } from '../../mocks/cdp-client.mock.js';

describe('CdpNetworkFeed', () => {
  let feed: CdpNetworkFeed;
  let channel: MockCdpClient;

  beforeEach(() => {
    feed = new CdpNetworkFeed();
    channel = new MockCdpClient();
  });

  describe('enable()', () => {
    it('should enable the Network domain', async () => {
      await feed.enable(channel);

      expect(channel.sendSpy).toHaveBeenCalledWith('Network.enable', {});
    });

    it('should propagate enable failures', async () => {
      channel.setError('Network.enable', new Error('Target closed'));

      await expect(feed.enable(channel)).rejects.toThrow('Target closed');
    });
  });

  describe('onRequest()', () => {
    it('should deliver method and URL', () => {
      const received: RequestEvent[] = [];
      feed.onRequest(channel, (event) => received.push(event));

      channel.emitRequest('POST', 'https://example.test/login');

      expect(received).toEqual([
        { kind: 'request', method: 'POST', url: 'https://example.test/login' },
      ]);
    });

    it('should drop payloads without a request object', () => {
      const callback = vi.fn();
      feed.onRequest(channel, callback);

      channel.emitEvent(REQUEST_EVENT, { requestId: 'r1' });
      channel.emitEvent(REQUEST_EVENT, { request: { method: 'GET' } });

      expect(callback).not.toHaveBeenCalled();
    });

    it('should stop delivering after unsubscribe', () => {
      const callback = vi.fn();
      const unsubscribe = feed.onRequest(channel, callback);

      unsubscribe();
      channel.emitRequest('GET', 'https://x/');

      expect(callback).not.toHaveBeenCalled();
      expect(channel.listenerCount(REQUEST_EVENT)).toBe(0);
    });
  });

  describe('onResponse()', () => {
    it('should deliver status, URL and MIME type', () => {
      const received: ResponseEvent[] = [];
      feed.onResponse(channel, (event) => received.push(event));

      channel.emitResponse(302, 'https://example.test/old', 'text/html');

      expect(received).toEqual([
        {
          kind: 'response',
          status: 302,
          url: 'https://example.test/old',
          contentType: 'text/html',
        },
      ]);
    });

    it('should drop payloads with a non-numeric status', () => {
      const callback = vi.fn();
      feed.onResponse(channel, callback);

      channel.emitEvent(RESPONSE_EVENT, {
        response: { status: '200', url: 'https://x/', mimeType: 'text/html' },
      });

      expect(callback).not.toHaveBeenCalled();
    });

    it('should not receive request events', () => {
      const callback = vi.fn();
      feed.onResponse(channel, callback);

      channel.emitRequest('GET', 'https://x/');

      expect(callback).not.toHaveBeenCalled();
    });

    it('should stop delivering after unsubscribe', () => {
      const callback = vi.fn();
      const unsubscribe = feed.onResponse(channel, callback);

      unsubscribe();
      channel.emitResponse(200, 'https://x/', 'text/html');

      expect(callback).not.toHaveBeenCalled();
      expect(channel.listenerCount(RESPONSE_EVENT)).toBe(0);
    });
  });
});
