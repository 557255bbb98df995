/**
 * Tessera Record Store
 *
 * Three owner-keyed stores plus the audit log, reachable only inside a
 * transaction. A transaction either commits every write it staged or none.
 * Implementations serialize transactions against each other; cross-owner
 * checks (target owner has no record) rely on that.
 */

import type { Owner } from '../context/ledgerContext.js';
import type { RegistryAuditRecordV1 } from '../audit/schema.js';
import type { IdentityRecord, PendingTransfer, TransferHistoryEntry } from './identity.js';

export interface KeyedStore<V> {
    /** Returns null when no value is stored under the key */
    get(owner: Owner): Promise<V | null>;
    set(owner: Owner, value: V): Promise<void>;
    delete(owner: Owner): Promise<void>;
}

export interface AuditLogStore {
    /** Integrity hash of the newest record, or null for an empty log */
    lastHash(): Promise<string | null>;
    append(record: RegistryAuditRecordV1): Promise<void>;
    /** All records, oldest first */
    list(): Promise<readonly RegistryAuditRecordV1[]>;
}

export interface StoreTx {
    readonly identities: KeyedStore<IdentityRecord>;
    readonly pendingTransfers: KeyedStore<PendingTransfer>;
    readonly transferHistory: KeyedStore<readonly TransferHistoryEntry[]>;
    readonly auditLog: AuditLogStore;
}

export interface RecordStore {
    /**
     * Runs work against a consistent view of the stores. Staged writes are
     * committed when work resolves and discarded when it rejects; the
     * rejection is rethrown unchanged.
     */
    transaction<T>(work: (tx: StoreTx) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}
