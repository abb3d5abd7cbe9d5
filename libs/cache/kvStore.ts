/**
 * Key-value store contract behind every cache namespace.
 */
export interface KeyValueStore {
    readonly name: string;
    get(key: string): Promise<string | null>;
    /** Writes only when the key is absent; returns whether it wrote */
    setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
    set(key: string, value: string, ttlSeconds?: number): Promise<void>;
    delete(key: string): Promise<boolean>;
    ping(): Promise<boolean>;
    close(): Promise<void>;
}

interface Entry {
    value: string;
    expiresAt?: number;
}

/**
 * In-memory store (local development and tests).
 */
export class InMemoryKeyValueStore implements KeyValueStore {
    private readonly entries = new Map<string, Entry>();

    constructor(
        public readonly name = 'memory',
        private readonly now: () => number = Date.now
    ) { }

    get size(): number {
        return this.entries.size;
    }

    async get(key: string): Promise<string | null> {
        return this.live(key)?.value ?? null;
    }

    async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
        if (this.live(key)) return false;
        this.entries.set(key, this.entry(value, ttlSeconds));
        return true;
    }

    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        this.entries.set(key, this.entry(value, ttlSeconds));
    }

    async delete(key: string): Promise<boolean> {
        return this.entries.delete(key);
    }

    async ping(): Promise<boolean> {
        return true;
    }

    async close(): Promise<void> {
        this.entries.clear();
    }

    private entry(value: string, ttlSeconds?: number): Entry {
        return ttlSeconds ? { value, expiresAt: this.now() + ttlSeconds * 1000 } : { value };
    }

    private live(key: string): Entry | undefined {
        const entry = this.entries.get(key);
        if (entry?.expiresAt !== undefined && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }
}
