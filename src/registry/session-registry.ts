/**
 * Session Registry
 *
 * Process-wide store of active browser sessions, keyed by caller-chosen
 * names, plus a single "current" slot that test bodies read from.
 *
 * Every operation is synchronous and runs to completion on the event loop,
 * so concurrent async callers can never observe a half-applied update.
 * The registry only references handles; closing them is the owner's job.
 */

import { InvalidKeyError, NoCurrentSessionError } from '../shared/errors/capture.error.js';
import type { SessionHandle } from '../browser/session-factory.js';

export class SessionRegistry<H = SessionHandle> {
  private readonly sessions = new Map<string, H>();
  private current: H | undefined;

  /**
   * Insert or overwrite the handle stored under `key`.
   *
   * @throws InvalidKeyError if key is empty
   */
  put(key: string, handle: H): void {
    this.assertKey(key, 'put');
    this.sessions.set(key, handle);
  }

  /**
   * @returns the stored handle, or undefined if nothing is stored under `key`
   * @throws InvalidKeyError if key is empty
   */
  get(key: string): H | undefined {
    this.assertKey(key, 'get');
    return this.sessions.get(key);
  }

  /**
   * Remove `key`. Removing an absent key is a no-op.
   *
   * @throws InvalidKeyError if key is empty
   */
  remove(key: string): void {
    this.assertKey(key, 'remove');
    this.sessions.delete(key);
  }

  /**
   * @throws InvalidKeyError if key is empty
   */
  contains(key: string): boolean {
    this.assertKey(key, 'contains');
    return this.sessions.has(key);
  }

  size(): number {
    return this.sessions.size;
  }

  /**
   * Snapshot of all keyed entries. Mutating the result does not affect the registry.
   */
  allEntries(): ReadonlyMap<string, H> {
    return new Map(this.sessions);
  }

  /**
   * Empty the keyed map. The current slot is left as is.
   */
  clearAll(): void {
    this.sessions.clear();
  }

  setCurrent(handle: H): void {
    this.current = handle;
  }

  /**
   * @returns the current handle, or undefined if none is set
   */
  getCurrent(): H | undefined {
    return this.current;
  }

  /**
   * Like getCurrent(), for callers that cannot proceed without a session.
   *
   * @throws NoCurrentSessionError if the slot is empty
   */
  requireCurrent(): H {
    if (this.current === undefined) {
      throw new NoCurrentSessionError({ registeredSessions: this.sessions.size });
    }
    return this.current;
  }

  clearCurrent(): void {
    this.current = undefined;
  }

  private assertKey(key: unknown, operation: string): void {
    if (typeof key !== 'string' || key.length === 0) {
      throw new InvalidKeyError(operation, { key });
    }
  }
}

// Singleton instance
let sessionRegistry: SessionRegistry | null = null;

/**
 * Get or create the process-wide SessionRegistry.
 */
export function getSessionRegistry(): SessionRegistry {
  sessionRegistry ??= new SessionRegistry();
  return sessionRegistry;
}

/**
 * Drop the process-wide registry (for testing).
 */
export function resetSessionRegistry(): void {
  sessionRegistry = null;
}
