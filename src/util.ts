/**
 * Memoizes async lookups by key for as long as the cache object lives.
 * Concurrent lookups of one key share a promise; a rejected lookup is
 * forgotten so the failure reaches every caller instead of being replayed.
 */
export class AsyncCache<K, V> {
    private entries = new Map<K, Promise<V>>();

    get(key: K, compute: () => Promise<V>): Promise<V> {
        const existing = this.entries.get(key);
        if(existing) return existing;
        const pending = compute();
        this.entries.set(key, pending);
        void pending.catch(() => {
            if(this.entries.get(key) === pending) this.entries.delete(key);
        });
        return pending;
    }
}
