/**
 * Network Event
 *
 * Metadata recorded for each request/response notification. Payload
 * bodies are never retained.
 */

export interface RequestEvent {
  readonly kind: 'request';
  readonly method: string;
  readonly url: string;
}

export interface ResponseEvent {
  readonly kind: 'response';
  readonly status: number;
  readonly url: string;
  /** MIME type reported by the browser (e.g. 'text/html') */
  readonly contentType: string;
}

export type NetworkEvent = RequestEvent | ResponseEvent;

/** Line written instead of an empty log */
export const NO_ACTIVITY_MARKER = 'No network requests were intercepted.';

export function requestEvent(method: string, url: string): RequestEvent {
  const event: RequestEvent = { kind: 'request', method, url };
  return Object.freeze(event);
}

export function responseEvent(status: number, url: string, contentType: string): ResponseEvent {
  const event: ResponseEvent = { kind: 'response', status, url, contentType };
  return Object.freeze(event);
}

/**
 * Render one event as a human-readable log line.
 */
export function formatNetworkEvent(event: NetworkEvent): string {
  switch (event.kind) {
    case 'request':
      return `Request: [Method: ${event.method}, URL: ${event.url}]`;
    case 'response':
      return `Response: [Status: ${event.status}, URL: ${event.url}, Content-Type: ${event.contentType}]`;
  }
}

/**
 * Render a drained buffer as log lines, or the marker line when it is empty.
 */
export function formatNetworkLog(events: readonly NetworkEvent[]): string[] {
  if (events.length === 0) {
    return [NO_ACTIVITY_MARKER];
  }
  return events.map(formatNetworkEvent);
}
