import pg from 'pg';
import { logger } from '../logging/logger.js';

const { Pool } = pg;

/**
 * The slice of a pg client the repositories use. Rows are untyped; callers
 * check the columns they read.
 */
export type Queryable = {
    query(text: string, params?: unknown[]): Promise<{ rows: pg.QueryResultRow[] }>;
};

export interface Database extends Queryable {
    /** SELECT 1 round trip for readiness */
    probe(): Promise<boolean>;
    close(): Promise<void>;
}

export interface DatabaseSettings {
    readonly url: string;
    readonly poolMax: number;
}

/**
 * PostgreSQL pool for the audit trail. Only the persistence adapter and the
 * health verifier use it; nothing on the request path waits on it.
 */
export function createDatabase(settings: DatabaseSettings): Database {
    const pool = new Pool({
        connectionString: settings.url,
        max: settings.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000
    });

    pool.on('error', (error: Error) => {
        logger.error({ error }, '[DB] Idle client error');
    });

    return {
        query: (text: string, params?: unknown[]) => pool.query(text, params),

        probe: async () => {
            try {
                await pool.query('SELECT 1');
                return true;
            } catch (error) {
                logger.warn({ error }, '[DB] Probe failed');
                return false;
            }
        },

        close: () => pool.end()
    };
}
