import { auth, driver as createDriver, isInt, session as accessModes, Driver } from 'neo4j-driver';
import { logger } from '../logging/logger.js';

export type GraphMode = 'read' | 'write';

export interface GraphRunOptions {
    readonly mode: GraphMode;
    readonly timeoutMs: number;
    readonly signal: AbortSignal;
}

export interface GraphClient {
    /** Rows as plain JSON-safe objects */
    run(query: string, parameters: Readonly<Record<string, unknown>>, options: GraphRunOptions): Promise<unknown[]>;
    ping(): Promise<boolean>;
    close(): Promise<void>;
}

export interface GraphConnectionSettings {
    readonly uri: string;
    readonly username: string;
    readonly password: string;
    readonly database: string;
}

/**
 * Converts driver values (64-bit integers, nodes, relationships) to plain
 * JSON values. Integers outside the safe range become strings.
 */
export function toPlain(value: unknown): unknown {
    if (isInt(value)) {
        return value.inSafeRange() ? value.toNumber() : value.toString();
    }
    if (Array.isArray(value)) {
        return value.map(toPlain);
    }
    if (value && typeof value === 'object') {
        return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, toPlain(inner)]));
    }
    return value;
}

/**
 * Neo4j over Bolt. Each run gets its own session and one explicit
 * transaction bounded by the server-side transaction timeout. A run is a
 * single attempt; aborting the signal closes the session.
 */
export class Neo4jGraphClient implements GraphClient {
    private readonly driver: Driver;

    constructor(private readonly settings: GraphConnectionSettings) {
        this.driver = createDriver(settings.uri, auth.basic(settings.username, settings.password), {
            maxConnectionPoolSize: 50,
            connectionAcquisitionTimeout: 10_000
        });
    }

    async run(query: string, parameters: Readonly<Record<string, unknown>>, options: GraphRunOptions): Promise<unknown[]> {
        const session = this.driver.session({
            database: this.settings.database,
            defaultAccessMode: options.mode === 'write' ? accessModes.WRITE : accessModes.READ
        });

        const onAbort = () => {
            session.close().then(undefined, (error: unknown) => {
                logger.warn({ error }, 'Failed to close aborted graph session');
            });
        };
        options.signal.addEventListener('abort', onAbort, { once: true });

        try {
            // Explicit transaction: the driver's managed transactions retry on
            // their own, and retries belong to the dispatcher alone.
            const tx = await session.beginTransaction({ timeout: options.timeoutMs });
            try {
                const result = await tx.run(query, { ...parameters });
                const rows = result.records.map(record => toPlain(record.toObject()));
                await tx.commit();
                return rows;
            } catch (error) {
                if (tx.isOpen()) {
                    await tx.rollback().catch((rollbackError: unknown) => {
                        logger.warn({ error: rollbackError }, 'Graph transaction rollback failed');
                    });
                }
                throw error;
            }
        } finally {
            options.signal.removeEventListener('abort', onAbort);
            await session.close();
        }
    }

    async ping(): Promise<boolean> {
        try {
            await this.driver.verifyConnectivity({ database: this.settings.database });
            return true;
        } catch (error) {
            logger.warn({ error }, 'Graph connectivity check failed');
            return false;
        }
    }

    close(): Promise<void> {
        return this.driver.close();
    }
}
