import { GuardRule } from '../config-guard.js';

const PROTECTED_ENVS = ['production', 'staging'];

/**
 * DB Configuration Guards
 * Applied only when the registry runs on PostgreSQL.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD' },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: (env) => !PROTECTED_ENVS.includes(env.NODE_ENV ?? '') || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    },
    {
        type: 'forbidIf',
        name: 'DB_SSL_QUERY',
        when: (env) => PROTECTED_ENVS.includes(env.NODE_ENV ?? '') && env.DB_SSL_QUERY === 'false',
        message: 'DB_SSL_QUERY=false is forbidden in production/staging',
    }
];
