import { z } from 'zod';
import { Env, GuardRule } from '../config-guard.js';
import { validate } from '../../validation/zod-middleware.js';
import { LogLevelSchema } from '../../logging/logger.js';

/**
 * Registry Configuration Guards
 * An in-process store loses every identity on restart; it is for
 * development and tests only.
 */
export const REGISTRY_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'forbidIf',
        name: 'REGISTRY_STORE',
        when: (env) => env.NODE_ENV === 'production' && (env.REGISTRY_STORE ?? 'memory') === 'memory',
        message: 'Production cannot use the in-memory record store',
    }
];

const DatabaseConfigSchema = z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535),
    user: z.string().min(1),
    password: z.string().min(1),
    database: z.string().min(1),
    poolMax: z.coerce.number().int().positive().default(20),
    caCert: z.string().optional(),
    sslQuery: z.boolean()
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

const RegistryConfigSchema = z.discriminatedUnion('store', [
    z.object({
        store: z.literal('memory'),
        logLevel: LogLevelSchema,
        orphanPolicy: z.enum(['preserve', 'cascade']),
        nodeEnv: z.string()
    }),
    z.object({
        store: z.literal('postgres'),
        logLevel: LogLevelSchema,
        orphanPolicy: z.enum(['preserve', 'cascade']),
        nodeEnv: z.string(),
        database: DatabaseConfigSchema
    })
]);

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;

/**
 * Builds typed configuration from environment variables.
 * Database settings are read only for the postgres store.
 */
export function loadRegistryConfig(env: Env = process.env): RegistryConfig {
    const store = env.REGISTRY_STORE ?? 'memory';
    const common = {
        store,
        logLevel: env.LOG_LEVEL ?? 'info',
        orphanPolicy: env.REGISTRY_ORPHAN_POLICY ?? 'preserve',
        nodeEnv: env.NODE_ENV ?? 'development'
    };

    const raw = store === 'postgres'
        ? {
            ...common,
            database: {
                host: env.DB_HOST,
                port: env.DB_PORT,
                user: env.DB_USER,
                password: env.DB_PASSWORD,
                database: env.DB_NAME,
                poolMax: env.DB_POOL_MAX,
                caCert: env.DB_CA_CERT,
                sslQuery: env.DB_SSL_QUERY === 'true'
            }
        }
        : common;

    return validate(RegistryConfigSchema, raw, 'Bootstrap:RegistryConfig');
}
