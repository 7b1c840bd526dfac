import { RingBuffer } from "./ringBuffer.js";
import type { Clock } from "./expiringCache.js";

export type UserId = number;

export type Exchange = Readonly<{
  query: string;
  response: string;
  /** Creation time in epoch milliseconds. */
  timestamp: number;
}>;

export type SessionHistoryOptions = {
  maxMessages?: number;
  expiryWindowMs?: number;
  now?: Clock;
};

const DEFAULT_MAX_MESSAGES = 5;
const DEFAULT_EXPIRY_WINDOW_MS = 60 * 60 * 1000;

/**
 * Per-user conversation memory: at most `maxMessages` exchanges per user, none older than
 * `expiryWindowMs`. Expired exchanges are discarded on every read and write of that user,
 * and a user left with nothing is dropped from the map. There is no background sweep;
 * `cleanupAll` prunes every user when the caller asks for it.
 *
 * Every method is synchronous, so each call runs to completion before another request
 * can observe or change the same user's buffer.
 */
export class SessionHistory {
  private readonly sessions = new Map<UserId, RingBuffer<Exchange>>();
  private readonly maxMessages: number;
  private readonly expiryWindowMs: number;
  private readonly now: Clock;

  constructor(options: SessionHistoryOptions = {}) {
    const maxMessages = options.maxMessages ?? DEFAULT_MAX_MESSAGES;
    if (!Number.isInteger(maxMessages) || maxMessages < 1) {
      throw new RangeError(`History maxMessages must be a positive integer, got ${maxMessages}`);
    }
    const expiryWindowMs = options.expiryWindowMs ?? DEFAULT_EXPIRY_WINDOW_MS;
    if (!Number.isFinite(expiryWindowMs) || expiryWindowMs <= 0) {
      throw new RangeError(`History expiry window must be a positive number of milliseconds, got ${expiryWindowMs}`);
    }

    this.maxMessages = maxMessages;
    this.expiryWindowMs = expiryWindowMs;
    this.now = options.now ?? Date.now;
  }

  addMessage(userId: UserId, query: string, response: string): Exchange {
    const now = this.now();
    let buffer = this.prune(userId, now);
    if (!buffer) {
      buffer = new RingBuffer<Exchange>(this.maxMessages);
      this.sessions.set(userId, buffer);
    }

    const exchange: Exchange = Object.freeze({ query, response, timestamp: now });
    buffer.push(exchange);
    return exchange;
  }

  /** Oldest first. The returned array is a snapshot; later writes do not show up in it. */
  getHistory(userId: UserId): readonly Exchange[] {
    const buffer = this.prune(userId, this.now());
    return buffer ? Object.freeze(buffer.toArray()) : [];
  }

  clearHistory(userId: UserId): void {
    this.sessions.delete(userId);
  }

  /** Prunes every known user. Returns the number of users dropped for having nothing left. */
  cleanupAll(): number {
    const now = this.now();
    let removedUsers = 0;
    for (const userId of [...this.sessions.keys()]) {
      if (!this.prune(userId, now)) {
        removedUsers += 1;
      }
    }
    return removedUsers;
  }

  /** Users currently holding at least one stored exchange. */
  get userCount(): number {
    return this.sessions.size;
  }

  hasUser(userId: UserId): boolean {
    return this.sessions.has(userId);
  }

  private prune(userId: UserId, now: number): RingBuffer<Exchange> | undefined {
    const buffer = this.sessions.get(userId);
    if (!buffer) {
      return undefined;
    }

    buffer.retain((exchange) => now - exchange.timestamp <= this.expiryWindowMs);
    if (buffer.length === 0) {
      this.sessions.delete(userId);
      return undefined;
    }
    return buffer;
  }
}
