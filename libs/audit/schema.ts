/**
 * Tessera Registry Audit Schema (v1)
 *
 * One record per committed registry mutation, hash-chained in commit order.
 */

import type { Height, Owner } from '../context/ledgerContext.js';

export type RegistryAuditEventType =
    | 'DID_CREATED'
    | 'DID_REVOKED'
    | 'CREDENTIAL_ADDED'
    | 'DID_DEACTIVATED'
    | 'DID_REACTIVATED'
    | 'TRANSFER_INITIATED'
    | 'TRANSFER_CANCELLED'
    | 'TRANSFER_ACCEPTED';

export type AuditDetailValue = string | number | boolean | null;

/**
 * Event produced by a registry operation, before it is chained.
 */
export interface RegistryEvent {
    type: RegistryAuditEventType;
    /** Owner whose state the event changed */
    subject: Owner;
    details: Record<string, AuditDetailValue>;
}

export interface AuditIntegrity {
    prevHash: string;     // Hash of the immediately preceding record
    hash: string;         // SHA-256(this_record_serialized || prevHash)
}

export interface RegistryAuditRecordV1 {
    eventId: string;        // UUID
    eventType: RegistryAuditEventType;
    recordedAt: string;     // ISO-8601 wall clock, informational only
    caller: Owner;
    height: Height;
    subject: Owner;
    details: Record<string, AuditDetailValue>;
    integrity: AuditIntegrity;
}

export const GENESIS_HASH = '0'.repeat(64);
