import { createClient } from 'redis';
import { logger } from '../logging/logger.js';
import { SpanNames, withSpan } from '../observability/tracing.js';
import type { RedisEndpoint } from '../bootstrap/settings.js';
import type { KeyValueStore } from './kvStore.js';

type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis-backed store. Connection errors are logged by the client's error
 * listener; individual commands reject and callers decide what that means.
 */
export class RedisKeyValueStore implements KeyValueStore {
    private readonly client: RedisClient;

    constructor(public readonly name: string, endpoint: RedisEndpoint) {
        this.client = createClient({ url: endpoint.url, database: endpoint.database });
        this.client.on('error', (error: unknown) => {
            logger.error({ store: name, error }, 'Redis client error');
        });
    }

    async connect(): Promise<void> {
        if (this.client.isOpen) return;
        await this.client.connect();
        logger.info({ store: this.name }, 'Redis connected');
    }

    get(key: string): Promise<string | null> {
        return withSpan(SpanNames.REDIS_OPERATION, { store: this.name, op: 'get' }, () => this.client.get(key));
    }

    async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
        const reply = await withSpan(SpanNames.REDIS_OPERATION, { store: this.name, op: 'set_nx' }, () =>
            ttlSeconds
                ? this.client.set(key, value, { NX: true, EX: ttlSeconds })
                : this.client.set(key, value, { NX: true })
        );
        return reply === 'OK';
    }

    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        await withSpan(SpanNames.REDIS_OPERATION, { store: this.name, op: 'set' }, () =>
            ttlSeconds
                ? this.client.set(key, value, { EX: ttlSeconds })
                : this.client.set(key, value)
        );
    }

    async delete(key: string): Promise<boolean> {
        const removed = await withSpan(SpanNames.REDIS_OPERATION, { store: this.name, op: 'del' }, () => this.client.del(key));
        return removed > 0;
    }

    async ping(): Promise<boolean> {
        if (!this.client.isReady) return false;
        try {
            return (await this.client.ping()) === 'PONG';
        } catch (error) {
            logger.warn({ store: this.name, error }, 'Redis ping failed');
            return false;
        }
    }

    async close(): Promise<void> {
        if (!this.client.isOpen) return;
        await this.client.quit();
    }
}
