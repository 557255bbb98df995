/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'key', '*.key',

    // Database connection
    'connectionString', '*.connectionString',
    'DB_PASSWORD', '*.DB_PASSWORD',
    'DB_CA_CERT', '*.DB_CA_CERT',

    // Registry payloads: credential statements are opaque and never logged
    'credential', '*.credential',
    'credentials', '*.credentials',
    'revocationReason', '*.revocationReason'
];

export const REDACT_CENSOR = '[REDACTED]';
