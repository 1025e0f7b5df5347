import { createHash } from "crypto";
import type { Confidence } from "../chat/confidence.js";

// ── Response Cache ───────────────────────────────────────

export interface CacheEntry {
  key: string;
  response: string;
  /** Confidence of the answer when it was cached. */
  confidence?: Confidence;
  /** Chunk ids the cached answer was grounded on. */
  sources: string[];
  createdAt: number;
  expiresAt: number;
}

export interface CacheMeta {
  confidence?: Confidence;
  sources?: string[];
}

export interface ResponseCacheOptions {
  ttlMs: number;
  now?: () => number;
}

/** Trim, lower-case and collapse whitespace, so incidental formatting never splits keys. */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, " ");
}

export function getCacheKey(query: string): string {
  return createHash("sha256").update(normalizeQuery(query)).digest("hex");
}

/**
 * Normalized query → answer, with lazy expiry: an entry read at or past
 * its expiry is evicted and reported absent. No timers.
 *
 * Knows nothing about conversation history. Callers decide which
 * questions are standalone enough to store.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  readonly ttlMs: number;

  constructor(opts: ResponseCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? Date.now;
  }

  get(query: string): string | undefined {
    return this.lookup(query)?.response;
  }

  lookup(query: string): CacheEntry | undefined {
    const key = getCacheKey(query);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return { ...entry, sources: [...entry.sources] };
  }

  put(
    query: string,
    response: string,
    meta: CacheMeta = {},
    ttlMs = this.ttlMs,
  ): void {
    const key = getCacheKey(query);
    const createdAt = this.now();
    this.prune(createdAt);
    this.entries.set(key, {
      key,
      response,
      confidence: meta.confidence,
      sources: [...(meta.sources ?? [])],
      createdAt,
      expiresAt: createdAt + ttlMs,
    });
  }

  /** Expired entries go on every write, so unread keys do not pile up. */
  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(key);
    }
  }

  /** Drop everything. Returns the number of entries removed. */
  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  /** Entries held, including expired ones not yet read. */
  get size(): number {
    return this.entries.size;
  }
}
