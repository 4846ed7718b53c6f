/**
 * Keyed session state with idle expiry.
 *
 * Entries record when they were last touched. Expired entries are removed by
 * a timer started with `start()`, not on lookup, so a read never pays for a
 * sweep. The timer is unref'd and does not keep the process alive.
 */

import { toError } from '../errors.js';
import { getLogger } from '../logger.js';

export interface SessionStoreOptions<T> {
  /** Idle time after which an entry is evicted. */
  ttlMs: number;
  /** Defaults to a tenth of the TTL, at least one second. */
  sweepIntervalMs?: number;
  /** Called for every evicted or deleted entry, e.g. to release a connection. */
  onEvict?: (key: string, value: T) => void;
  now?: () => number;
}

interface Session<T> {
  value: T;
  lastTouched: number;
}

export class SessionStore<T> {
  readonly ttlMs: number;
  readonly sweepIntervalMs: number;
  private readonly sessions = new Map<string, Session<T>>();
  private readonly onEvict: ((key: string, value: T) => void) | null;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(opts: SessionStoreOptions<T>) {
    this.ttlMs = opts.ttlMs;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? Math.max(1000, Math.floor(opts.ttlMs / 10));
    this.onEvict = opts.onEvict ?? null;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Look up a session and mark it as used.
   */
  get(key: string): T | undefined {
    const session = this.sessions.get(key);
    if (!session) return undefined;
    session.lastTouched = this.now();
    return session.value;
  }

  set(key: string, value: T): void {
    this.sessions.set(key, { value, lastTouched: this.now() });
  }

  /**
   * Returns false when there is no such session.
   */
  touch(key: string): boolean {
    const session = this.sessions.get(key);
    if (!session) return false;
    session.lastTouched = this.now();
    return true;
  }

  delete(key: string): boolean {
    const session = this.sessions.get(key);
    if (!session) return false;
    this.sessions.delete(key);
    this.release(key, session.value);
    return true;
  }

  /**
   * Evict every session idle for longer than the TTL. Returns the evicted keys.
   */
  sweep(now: number = this.now()): string[] {
    const evicted: string[] = [];
    for (const [key, session] of this.sessions) {
      if (now - session.lastTouched > this.ttlMs) {
        this.sessions.delete(key);
        this.release(key, session.value);
        evicted.push(key);
      }
    }
    if (evicted.length > 0) {
      getLogger().debug('Evicted idle sessions', { count: evicted.length });
    }
    return evicted;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  /**
   * Stop the sweep timer and release every remaining session.
   */
  close(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const key of [...this.sessions.keys()]) {
      this.delete(key);
    }
  }

  private release(key: string, value: T): void {
    if (!this.onEvict) return;
    try {
      this.onEvict(key, value);
    } catch (e) {
      getLogger().warn('Session release failed', { key, error: toError(e).message });
    }
  }
}
