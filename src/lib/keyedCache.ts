/**
 * Process-lifetime cache of async lookups. Concurrent callers of one key share
 * the in-flight promise; a rejected load is evicted so a later call can retry.
 */
export class KeyedCache<V> {
  private readonly entries = new Map<string, Promise<V>>();

  getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing) return existing;
    const pending = load();
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    });
    return pending;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear() {
    this.entries.clear();
  }
}
