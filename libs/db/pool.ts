import pg from 'pg';
import { getComponentLogger } from '../logging/logger.js';
import type { DatabaseConfig } from '../bootstrap/config/db-config.js';

const { Pool } = pg;
const logger = getComponentLogger('DatabasePool');

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

/**
 * Builds the PostgreSQL pool used by the event outbox.
 * TLS is mandatory whenever a CA certificate is configured.
 */
export function createPool(config: DatabaseConfig): pg.Pool {
    const pool = new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.caCert
            ? { rejectUnauthorized: true, ca: config.caCert }
            : false
    });

    pool.on('error', (error: Error) => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });

    return pool;
}
