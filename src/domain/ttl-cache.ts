/**
 * In-memory TTL cache
 *
 * Entries are never purged: a stale entry stays in storage and is masked on
 * read until the next put() overwrites it. One instance per server.
 */

export const DEFAULT_TTL_SECONDS = 86400;

interface CacheEntry<T> {
  storedAt: number;
  value: T;
}

export class TtlCache<T = unknown> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  /**
   * @param now - Clock in milliseconds (injected for tests)
   */
  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Return the value only if it is younger than `ttlSeconds`
   */
  get(key: string, ttlSeconds: number = DEFAULT_TTL_SECONDS): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    const ageMs = this.now() - entry.storedAt;
    return ageMs < ttlSeconds * 1000 ? entry.value : undefined;
  }

  put(key: string, value: T): void {
    this.entries.set(key, { storedAt: this.now(), value });
  }

  /** Whether any entry (fresh or stale) is stored under `key` */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
