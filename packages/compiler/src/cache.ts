/**
 * Adapted-pattern cache.
 *
 * Keyed by macro name, dialect profile and the adaptation options that change
 * the output. Population runs once per key: a second request while the first
 * is still computing is a re-entrant call, which adaptation never makes, so it
 * is treated as an internal fault rather than computed twice.
 */

import { profileKey } from "./dialect.js";
import { InternalExpansionInvariantError } from "./errors.js";
import type { AdaptOptions, DialectProfile } from "./types.js";

export interface CacheStats {
  hits: number;
  misses: number;
}

export class PatternCache<V> {
  private entries = new Map<string, V>();
  private inFlight = new Set<string>();

  /** Statistics for cache performance monitoring */
  public readonly stats: CacheStats = {
    hits: 0,
    misses: 0,
  };

  /**
   * Compute a cache key. `allowInternal` only gates access, so it is not part
   * of the key.
   */
  computeKey(name: string, profile: DialectProfile, options: AdaptOptions = {}): string {
    const nonCapturing = [...new Set(options.nonCapturing ?? [])].sort().join(",");
    return [name, profileKey(profile), options.autoDisambiguate ? "d" : "-", nonCapturing].join("\0");
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  /**
   * Return the cached value for `key`, computing and storing it on first use.
   * A failed computation stores nothing.
   */
  getOrCompute(key: string, compute: () => V): V {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.stats.hits++;
      return cached;
    }
    if (this.inFlight.has(key)) {
      throw new InternalExpansionInvariantError(`re-entrant population of pattern cache key ${JSON.stringify(key)}`);
    }

    this.stats.misses++;
    this.inFlight.add(key);
    try {
      const value = compute();
      this.entries.set(key, value);
      return value;
    } finally {
      this.inFlight.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.stats.hits = 0;
    this.stats.misses = 0;
  }
}
