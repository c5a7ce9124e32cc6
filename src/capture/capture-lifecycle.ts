/**
 * Capture Lifecycle
 *
 * Brackets one test execution with a browser session and a network
 * capture. The test runner calls:
 *
 * - beforeTest() before the body: starts the session, publishes it as the
 *   current session and subscribes to the network feed
 * - afterTest() when the body completed, whatever its assertions did
 * - onTestException() when the body threw: same as afterTest(), then
 *   rethrows the original error
 *
 * State machine per test: idle -> starting -> capturing -> flushing -> terminated.
 * A terminated lifecycle accepts the next beforeTest().
 */

import type { CdpClient } from '../cdp/cdp-client.interface.js';
import type { SessionFactory } from '../browser/session-factory.js';
import type { SessionRegistry } from '../registry/session-registry.js';
import type { LogSink } from '../sinks/log-sink.js';
import { FileLogSink } from '../sinks/file-log-sink.js';
import { CdpNetworkFeed, type EventFeed, type Unsubscribe } from './event-feed.js';
import { EventBuffer } from './event-buffer.js';
import { formatNetworkLog, type NetworkEvent } from './network-event.js';
import {
  CaptureStateError,
  SessionInitError,
  SinkWriteError,
} from '../shared/errors/capture.error.js';
import { toError } from '../lib/error-message.js';
import { getLogger } from '../shared/services/logging.service.js';

export type CaptureState = 'idle' | 'starting' | 'capturing' | 'flushing' | 'terminated';

/**
 * Event emitted on capture state changes
 */
export interface CaptureStateChangeEvent {
  previousState: CaptureState;
  currentState: CaptureState;
  testName?: string;
  timestamp: Date;
}

/**
 * What the runner knows about the test being started
 */
export interface TestContext {
  testName: string;
}

export interface CaptureLifecycleOptions<H> {
  /** Starts and stops browser sessions */
  factory: SessionFactory<H>;

  /** Registry the session is published to while the test runs */
  registry: SessionRegistry<H>;

  /** Network event source (default: CDP Network domain) */
  feed?: EventFeed;

  /** Where the captured log goes (default: FileLogSink in ./logs) */
  sink?: LogSink;

  /**
   * Also store the session under this key while the test runs.
   * A function receives the test context (useful for parallel tests).
   */
  registryKey?: string | ((context: TestContext) => string);

  /** Called after a sink failure has been logged */
  onSinkError?: (error: SinkWriteError) => void;
}

export class CaptureLifecycle<H> {
  private readonly factory: SessionFactory<H>;
  private readonly registry: SessionRegistry<H>;
  private readonly feed: EventFeed;
  private readonly sink: LogSink;
  private readonly registryKey?: string | ((context: TestContext) => string);
  private readonly onSinkError?: (error: SinkWriteError) => void;
  private readonly logger = getLogger();

  private _state: CaptureState = 'idle';
  private readonly stateChangeListeners = new Set<(event: CaptureStateChangeEvent) => void>();

  // Per-test resources
  private context: TestContext | null = null;
  private startedAt = new Date(0);
  private handle: H | undefined;
  private channel: CdpClient | null = null;
  private buffer: EventBuffer | null = null;
  private activeKey: string | null = null;
  private unsubscribers: Unsubscribe[] = [];

  constructor(options: CaptureLifecycleOptions<H>) {
    this.factory = options.factory;
    this.registry = options.registry;
    this.feed = options.feed ?? new CdpNetworkFeed();
    this.sink = options.sink ?? new FileLogSink();
    this.registryKey = options.registryKey;
    this.onSinkError = options.onSinkError;
  }

  get state(): CaptureState {
    return this._state;
  }

  /**
   * Registry the running test's session is published to
   */
  get sessionRegistry(): SessionRegistry<H> {
    return this.registry;
  }

  /**
   * Subscribe to state changes
   *
   * @returns function that removes the listener
   */
  onStateChange(listener: (event: CaptureStateChangeEvent) => void): () => void {
    this.stateChangeListeners.add(listener);
    return () => this.stateChangeListeners.delete(listener);
  }

  /**
   * Events captured so far in the running test. Empty once flushed.
   */
  getCapturedEvents(): NetworkEvent[] {
    return this.buffer?.snapshot() ?? [];
  }

  /**
   * Start the session and network capture for a test.
   *
   * @throws SessionInitError if the session, channel or listeners could not be set up
   * @throws CaptureStateError if the previous test has not finished
   */
  async beforeTest(context: TestContext): Promise<void> {
    if (this._state !== 'idle' && this._state !== 'terminated') {
      throw new CaptureStateError(this._state, 'beforeTest', { testName: context.testName });
    }

    const buffer = new EventBuffer();
    this.context = context;
    this.startedAt = new Date();
    this.buffer = buffer;
    this.transitionTo('starting');

    let handle: H | null | undefined;
    try {
      handle = await this.factory.createSession();
    } catch (error) {
      this.transitionTo('terminated');
      throw new SessionInitError('createSession', toError(error), {
        testName: context.testName,
      });
    }

    if (handle === null || handle === undefined) {
      this.transitionTo('terminated');
      throw new SessionInitError('createSession', undefined, {
        testName: context.testName,
        reason: 'Session factory returned no handle',
      });
    }

    this.handle = handle;

    let stage = 'publishSession';
    try {
      this.registry.setCurrent(handle);
      if (this.registryKey !== undefined) {
        const key =
          typeof this.registryKey === 'function' ? this.registryKey(context) : this.registryKey;
        this.registry.put(key, handle);
        this.activeKey = key;
      }

      stage = 'openDebugChannel';
      const channel = await this.factory.openDebugChannel(handle);
      this.channel = channel;

      stage = 'enableFeed';
      await this.feed.enable(channel);

      stage = 'registerListeners';
      // Bound to this test's buffer so late events never leak into the next test
      this.unsubscribers.push(
        this.feed.onRequest(channel, (event) => {
          buffer.append(event);
        })
      );
      this.unsubscribers.push(
        this.feed.onResponse(channel, (event) => {
          buffer.append(event);
        })
      );
    } catch (error) {
      this.logger.error('Network capture setup failed', toError(error), {
        testName: context.testName,
        stage,
      });
      await this.quiesce();
      await this.teardown(handle);
      this.transitionTo('terminated');
      throw new SessionInitError(stage, toError(error), { testName: context.testName });
    }

    this.transitionTo('capturing');
    this.logger.debug('Network capture started', { testName: context.testName });
  }

  /**
   * Test body completed (pass or assertion failure): flush and tear down.
   * A no-op unless a capture is running.
   */
  async afterTest(): Promise<void> {
    if (this._state !== 'capturing') {
      this.logger.debug('afterTest ignored', { state: this._state });
      return;
    }
    await this.finish();
  }

  /**
   * Test body threw: flush and tear down, then rethrow `error` unchanged.
   */
  async onTestException(error: unknown): Promise<never> {
    if (this._state === 'capturing') {
      await this.finish();
    } else {
      this.logger.debug('onTestException without running capture', { state: this._state });
    }
    throw error;
  }

  private async finish(): Promise<void> {
    // Leaves 'capturing' synchronously so a second terminal hook is a no-op
    this.transitionTo('flushing');
    const handle = this.handle;
    const buffer = this.buffer;

    try {
      await this.quiesce();
      if (buffer) {
        await this.flush(buffer);
      }
    } finally {
      if (handle !== undefined) {
        await this.teardown(handle);
      }
      this.transitionTo('terminated');
    }
  }

  /**
   * Stop event delivery: remove listeners and close the channel.
   */
  private async quiesce(): Promise<void> {
    for (const unsubscribe of this.unsubscribers) {
      try {
        unsubscribe();
      } catch (error) {
        this.logger.debug('Listener removal failed', {
          error: toError(error).message,
        });
      }
    }
    this.unsubscribers = [];

    const channel = this.channel;
    this.channel = null;
    if (channel) {
      try {
        await channel.close();
      } catch (error) {
        this.logger.debug('Debug channel close failed', { error: toError(error).message });
      }
    }
  }

  private async flush(buffer: EventBuffer): Promise<void> {
    const testName = this.context?.testName ?? 'unknown-test';
    const lines = formatNetworkLog(buffer.drain());

    try {
      await this.sink.write({ testName, lines, startedAt: this.startedAt });
    } catch (error) {
      const sinkError = new SinkWriteError(this.sink.name, toError(error), { testName });
      this.logger.error(sinkError.message, sinkError, { testName });
      try {
        this.onSinkError?.(sinkError);
      } catch (callbackError) {
        this.logger.error('Sink error callback failed', toError(callbackError), { testName });
      }
    }
  }

  /**
   * Unpublish and close the session. Failures are logged, never thrown.
   */
  private async teardown(handle: H): Promise<void> {
    this.handle = undefined;

    if (this.registry.getCurrent() === handle) {
      this.registry.clearCurrent();
    }
    if (this.activeKey !== null) {
      if (this.registry.get(this.activeKey) === handle) {
        this.registry.remove(this.activeKey);
      }
      this.activeKey = null;
    }

    try {
      await this.factory.closeSession(handle);
    } catch (error) {
      this.logger.error('Failed to close browser session', toError(error), {
        testName: this.context?.testName,
      });
    }
  }

  private transitionTo(newState: CaptureState): void {
    const previousState = this._state;
    if (previousState === newState) return;

    this._state = newState;
    this.logger.debug('Capture state changed', { previousState, currentState: newState });

    const event: CaptureStateChangeEvent = {
      previousState,
      currentState: newState,
      testName: this.context?.testName,
      timestamp: new Date(),
    };
    for (const listener of this.stateChangeListeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('State change listener error', toError(error));
      }
    }
  }
}
