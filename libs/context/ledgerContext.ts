/**
 * Tessera Ledger Context
 *
 * The ledger supplies two trusted values with every operation:
 * the authenticated caller and the current logical height.
 * The registry never establishes either itself.
 */

/** Opaque, ledger-authenticated principal. Primary key of every store. */
export type Owner = string;

/** Monotonic logical clock value supplied by the ledger. */
export type Height = number;

export interface LedgerContext {
    /** Authenticated principal performing the operation */
    readonly caller: Owner;
    /** Current logical height */
    readonly height: Height;
}

export function ledgerContext(caller: Owner, height: Height): LedgerContext {
    return Object.freeze({ caller, height });
}
