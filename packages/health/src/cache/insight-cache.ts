/**
 * InsightCache - in-process cache of generated insights with per-fingerprint
 * reservations.
 *
 * The first caller for a fingerprint gets a reservation token and is the only
 * one allowed to generate; later callers get a pending handle and wait for the
 * same outcome. All state changes happen synchronously, so reserve, complete
 * and evict never interleave for one fingerprint.
 *
 * Ready entries expire `ttlMs` after the insight was generated, however late it
 * reached the cache; beyond `maxEntries` the least recently
 * used ready entry is evicted. Pending entries are never evicted. Failures are
 * handed to current waiters and then forgotten, so the next caller retries.
 */

import type { Insight } from "../models/index.js";
import { CacheCorruptionError, InsightTimeoutError } from "../errors.js";
import { shortFingerprint } from "./fingerprint.js";

export interface InsightCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

/**
 * Grants the right to generate and publish one fingerprint
 */
export interface ReservationToken {
  readonly fingerprint: string;
  readonly id: number;
}

export type CacheLookup =
  | { status: "ready"; insight: Insight }
  | { status: "reserved"; token: ReservationToken }
  | { status: "pending"; wait: (timeoutMs: number) => Promise<Insight> };

export interface InsightCacheStats {
  size: number;
  ready: number;
  pending: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  corruptions: number;
  failures: number;
  waitTimeouts: number;
}

interface Waiter {
  resolve: (insight: Insight) => void;
  reject: (error: Error) => void;
}

type Outcome = { ok: true; insight: Insight } | { ok: false; error: Error };

interface ReadyEntry {
  state: "ready";
  insight: Insight;
  expiresAt: number;
}

interface PendingEntry {
  state: "pending";
  token: ReservationToken;
  waiters: Set<Waiter>;
  /** Set once the reservation completes */
  outcome?: Outcome;
}

type CacheEntry = ReadyEntry | PendingEntry;

type Counter = Exclude<keyof InsightCacheStats, "size" | "ready" | "pending">;

export class InsightCache {
  /** Map insertion order doubles as recency order for ready entries */
  private readonly entries = new Map<string, CacheEntry>();
  private sequence = 0;
  private readonly counters: Record<Counter, number> = {
    hits: 0,
    misses: 0,
    evictions: 0,
    expirations: 0,
    corruptions: 0,
    failures: 0,
    waitTimeouts: 0,
  };

  constructor(private readonly options: InsightCacheOptions) {}

  /**
   * Return the cached insight, reserve the fingerprint for this caller, or
   * hand back a way to wait on the caller that already holds it.
   */
  reserveOrGet(fingerprint: string): CacheLookup {
    const entry = this.entries.get(fingerprint);

    if (entry?.state === "pending") {
      return { status: "pending", wait: (timeoutMs) => this.waitFor(entry, timeoutMs) };
    }

    if (entry?.state === "ready") {
      const insight = this.takeReady(fingerprint, entry);
      if (insight) {
        this.counters.hits++;
        return { status: "ready", insight };
      }
    }

    const token: ReservationToken = { fingerprint, id: ++this.sequence };
    this.entries.set(fingerprint, { state: "pending", token, waiters: new Set() });
    this.counters.misses++;
    return { status: "reserved", token };
  }

  /**
   * Publish the outcome of a reservation to every waiter.
   * Returns false, changing nothing, for an unknown or stale token.
   */
  complete(token: ReservationToken, result: Insight | Error): boolean {
    const entry = this.entries.get(token.fingerprint);
    if (entry?.state !== "pending" || entry.token !== token) {
      return false;
    }

    const waiters = [...entry.waiters];
    entry.waiters.clear();

    if (result instanceof Error) {
      entry.outcome = { ok: false, error: result };
      this.entries.delete(token.fingerprint);
      this.counters.failures++;
      for (const waiter of waiters) waiter.reject(result);
      return true;
    }

    entry.outcome = { ok: true, insight: result };
    const { ttlMs } = this.options;
    // Re-insert so the fresh entry is most recently used
    this.entries.delete(token.fingerprint);
    this.entries.set(token.fingerprint, {
      state: "ready",
      insight: result,
      expiresAt: Math.min(Date.now(), result.generatedAt) + ttlMs,
    });
    this.evictOverflow();
    for (const waiter of waiters) waiter.resolve(result);
    return true;
  }

  /**
   * Drop ready entries past their TTL. Returns how many were dropped.
   */
  evictExpired(now: number = Date.now()): number {
    let dropped = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (entry.state === "ready" && entry.expiresAt <= now) {
        this.entries.delete(fingerprint);
        dropped++;
      }
    }
    this.counters.expirations += dropped;
    return dropped;
  }

  /**
   * Drop a ready entry. In-flight reservations are left alone.
   */
  delete(fingerprint: string): boolean {
    const entry = this.entries.get(fingerprint);
    if (entry?.state !== "ready") return false;
    return this.entries.delete(fingerprint);
  }

  /**
   * Drop every ready entry
   */
  clear(): void {
    for (const [fingerprint, entry] of this.entries) {
      if (entry.state === "ready") this.entries.delete(fingerprint);
    }
  }

  stats(): InsightCacheStats {
    let ready = 0;
    for (const entry of this.entries.values()) {
      if (entry.state === "ready") ready++;
    }
    return {
      size: this.entries.size,
      ready,
      pending: this.entries.size - ready,
      ...this.counters,
    };
  }

  /**
   * Validate a ready entry and mark it most recently used.
   * Expired or corrupted entries are removed and yield undefined.
   */
  private takeReady(fingerprint: string, entry: ReadyEntry): Insight | undefined {
    this.entries.delete(fingerprint);

    if (entry.expiresAt <= Date.now()) {
      this.counters.expirations++;
      return undefined;
    }

    if (entry.insight.fingerprint !== fingerprint) {
      const error = new CacheCorruptionError(
        `Entry ${shortFingerprint(fingerprint)} holds insight ${shortFingerprint(entry.insight.fingerprint)}, dropping`
      );
      console.error("Insight cache corruption:", error.message);
      this.counters.corruptions++;
      return undefined;
    }

    this.entries.set(fingerprint, entry);
    return entry.insight;
  }

  private waitFor(entry: PendingEntry, timeoutMs: number): Promise<Insight> {
    const { outcome } = entry;
    if (outcome) {
      return outcome.ok ? Promise.resolve(outcome.insight) : Promise.reject(outcome.error);
    }

    return new Promise<Insight>((resolve, reject) => {
      const timer = setTimeout(() => {
        entry.waiters.delete(waiter);
        this.counters.waitTimeouts++;
        reject(
          new InsightTimeoutError(
            `Timed out after ${timeoutMs}ms waiting for insight ${shortFingerprint(entry.token.fingerprint)}`
          )
        );
      }, timeoutMs);

      const waiter: Waiter = {
        resolve: (insight) => {
          clearTimeout(timer);
          resolve(insight);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      entry.waiters.add(waiter);
    });
  }

  private evictOverflow(): void {
    let ready = this.stats().ready;
    for (const [fingerprint, entry] of this.entries) {
      if (ready <= this.options.maxEntries) break;
      if (entry.state === "ready") {
        this.entries.delete(fingerprint);
        this.counters.evictions++;
        ready--;
      }
    }
  }
}
