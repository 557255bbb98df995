/**
 * Tessera Identity Model
 *
 * One identity record per owner. Credentials are append-only and bounded;
 * ownership moves only through the two-step transfer handshake.
 */

import type { Height, Owner } from '../context/ledgerContext.js';

/** Credential vault capacity per identity. */
export const MAX_CREDENTIALS = 10;

/** Transfer history capacity per recipient. */
export const MAX_TRANSFER_HISTORY = 10;

/** Height units a pending transfer stays acceptable after initiation. */
export const TRANSFER_WINDOW = 144;

/** Required DID method prefix. */
export const DID_PREFIX = 'did:stx:';

export const MAX_DID_LENGTH = 100;
export const MAX_CREDENTIAL_LENGTH = 200;
export const MAX_REASON_LENGTH = 100;

/**
 * Identity record held under its owner's key.
 */
export interface IdentityRecord {
    /** Decentralized identifier, immutable once created */
    readonly did: string;
    /** Opaque credential statements in insertion order */
    readonly credentials: readonly string[];
    /** Height at creation */
    readonly createdAt: Height;
    /** Height of the last write to this record */
    readonly updatedAt: Height;
    readonly isActive: boolean;
    /** Present only while deactivated */
    readonly revocationReason: string | null;
}

/**
 * In-flight ownership transfer, keyed by the current owner.
 */
export interface PendingTransfer {
    readonly newOwner: Owner;
    readonly initiatedAt: Height;
    readonly expiresAt: Height;
}

/**
 * Completed transfer, kept in the recipient's history.
 */
export interface TransferHistoryEntry {
    readonly from: Owner;
    readonly to: Owner;
    readonly timestamp: Height;
}

/**
 * What happens to pending transfers and history keyed by an owner
 * whose identity is revoked.
 * - preserve: left in place; a later createDid by the same owner inherits them
 * - cascade: deleted in the same transaction as the record
 */
export type OrphanPolicy = 'preserve' | 'cascade';

export function freezeRecord(record: IdentityRecord): IdentityRecord {
    return Object.freeze({
        ...record,
        credentials: Object.freeze([...record.credentials])
    });
}
