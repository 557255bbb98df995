import pg from 'pg';
import { logger } from '../logging/logger.js';
import type { DatabaseConfig } from '../bootstrap/config/registry-config.js';

const { Pool } = pg;

const PROTECTED_ENVS = new Set(['production', 'staging']);

export const REGISTRY_TABLES = [
    'identities',
    'pending_transfers',
    'transfer_history',
    'registry_audit_log'
] as const;

/**
 * PostgreSQL connection pool for the registry store.
 * TLS is mandatory in protected environments; elsewhere it follows DB_SSL_QUERY.
 */
export function createPool(config: DatabaseConfig, nodeEnv: string): pg.Pool {
    const isProtectedEnv = PROTECTED_ENVS.has(nodeEnv);
    if (isProtectedEnv && !config.caCert) {
        throw new Error("CRITICAL: Missing DB_CA_CERT in protected environment (production/staging). Database connection aborted.");
    }

    const pool = new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: isProtectedEnv || config.sslQuery
            ? {
                rejectUnauthorized: true,
                ca: config.caCert,
            }
            : false
    });

    pool.on('error', (error) => {
        logger.error({ error }, '[DB] Idle client error');
    });

    return pool;
}

/**
 * Boot-time probe: every registry table must exist before the node serves.
 */
export async function probeSchema(pool: pg.Pool): Promise<void> {
    const result = await pool.query<{ table_name: string; present: boolean }>(
        `SELECT t.table_name, to_regclass(t.table_name) IS NOT NULL AS present
         FROM unnest($1::text[]) AS t(table_name)`,
        [[...REGISTRY_TABLES]]
    );

    const missing = result.rows.filter(row => !row.present).map(row => row.table_name);
    if (missing.length > 0) {
        throw new Error(`CRITICAL: Registry schema incomplete. Missing tables: ${missing.join(', ')}`);
    }
}
