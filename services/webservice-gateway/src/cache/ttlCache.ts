export type Clock = () => number;

interface Entry<V> {
    value: V;
    expiresAt: number;
}

/** Map with a per-entry expiry. Expired entries are dropped on read. */
export class TTLCache<K, V> {
    private readonly entries = new Map<K, Entry<V>>();

    constructor(
        private readonly defaultTtlMs: number,
        private readonly now: Clock = Date.now
    ) {}

    get(key: K): V | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (this.now() >= entry.expiresAt) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    set(key: K, value: V, ttlMs: number = this.defaultTtlMs): void {
        this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    }

    invalidateMatching(predicate: (key: K) => boolean): void {
        for (const key of [...this.entries.keys()]) {
            if (predicate(key)) this.entries.delete(key);
        }
    }

    clear(): void {
        this.entries.clear();
    }

    /** Number of stored entries, expired ones included until they are read. */
    get size(): number {
        return this.entries.size;
    }
}
