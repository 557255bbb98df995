/**
 * Tessera Registry Error Taxonomy
 *
 * Every rejected mutation maps to exactly one code. ALREADY_DEACTIVATED is
 * returned in both lifecycle directions (deactivating an inactive identity and
 * reactivating an active one).
 */

export const REGISTRY_ERROR_CODES = [
    'UNAUTHORIZED',
    'ALREADY_EXISTS',
    'NOT_FOUND',
    'MAX_CREDENTIALS',
    'ALREADY_DEACTIVATED',
    'DEACTIVATED',
    'TRANSFER_IN_PROGRESS',
    'NO_PENDING_TRANSFER',
    'TRANSFER_EXPIRED',
    'SELF_TRANSFER',
    'HISTORY_FULL',
    'INVALID_DID_FORMAT',
    'INVALID_CREDENTIAL_FORMAT'
] as const;

export type RegistryErrorCode = typeof REGISTRY_ERROR_CODES[number];

/**
 * Stable numeric codes for ledger-facing clients.
 */
export const REGISTRY_ERROR_NUMBERS: Readonly<Record<RegistryErrorCode, number>> = Object.freeze({
    UNAUTHORIZED: 100,
    ALREADY_EXISTS: 101,
    NOT_FOUND: 102,
    MAX_CREDENTIALS: 103,
    ALREADY_DEACTIVATED: 104,
    DEACTIVATED: 105,
    TRANSFER_IN_PROGRESS: 106,
    NO_PENDING_TRANSFER: 107,
    TRANSFER_EXPIRED: 108,
    SELF_TRANSFER: 109,
    HISTORY_FULL: 110,
    INVALID_DID_FORMAT: 111,
    INVALID_CREDENTIAL_FORMAT: 112
});

/**
 * Thrown inside a store transaction to abort it. Converted to a
 * RegistryResult at the operation boundary.
 */
export class RegistryError extends Error {
    readonly numericCode: number;

    constructor(public readonly code: RegistryErrorCode) {
        super(`Registry operation rejected: ${code}`);
        this.name = 'RegistryError';
        this.numericCode = REGISTRY_ERROR_NUMBERS[code];
    }
}

/**
 * Outcome of a mutating registry operation.
 */
export type RegistryResult =
    | { success: true }
    | { success: false; reason: RegistryErrorCode };

export function reject(code: RegistryErrorCode): never {
    throw new RegistryError(code);
}
