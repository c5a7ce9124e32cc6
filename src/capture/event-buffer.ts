/**
 * Event Buffer
 *
 * Append-only sequence of network events for a single test execution.
 * Appends come from CDP event callbacks, which the event loop delivers one
 * at a time, so each append is atomic. The buffer is drained exactly once.
 */

import type { NetworkEvent } from './network-event.js';

export class EventBuffer {
  private events: NetworkEvent[] = [];
  private drained = false;

  /**
   * Record an event. Events arriving after drain() are dropped.
   *
   * @returns false if the buffer was already drained
   */
  append(event: NetworkEvent): boolean {
    if (this.drained) {
      return false;
    }
    this.events.push(event);
    return true;
  }

  /**
   * Hand over all recorded events in insertion order and close the buffer.
   *
   * @throws Error if called twice
   */
  drain(): readonly NetworkEvent[] {
    if (this.drained) {
      throw new Error('Event buffer already drained');
    }
    this.drained = true;
    const events = this.events;
    this.events = [];
    return events;
  }

  /**
   * Copy of the events recorded so far.
   */
  snapshot(): NetworkEvent[] {
    return [...this.events];
  }

  size(): number {
    return this.events.length;
  }

  isDrained(): boolean {
    return this.drained;
  }
}
