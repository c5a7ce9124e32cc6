/**
 * Network Capture Module
 */

export {
  CaptureLifecycle,
  type CaptureLifecycleOptions,
  type CaptureState,
  type CaptureStateChangeEvent,
  type TestContext,
} from './capture-lifecycle.js';
export { EventBuffer } from './event-buffer.js';
export {
  CdpNetworkFeed,
  RequestWillBeSentSchema,
  ResponseReceivedSchema,
  type EventFeed,
  type Unsubscribe,
} from './event-feed.js';
export {
  NO_ACTIVITY_MARKER,
  formatNetworkEvent,
  formatNetworkLog,
  requestEvent,
  responseEvent,
  type NetworkEvent,
  type RequestEvent,
  type ResponseEvent,
} from './network-event.js';
