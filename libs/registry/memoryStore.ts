/**
 * In-process record store.
 *
 * Single writer: transactions run one at a time in arrival order. Writes are
 * staged per transaction and published to the committed maps only when the
 * transaction's work resolves.
 */

import type { Owner } from '../context/ledgerContext.js';
import type { RegistryAuditRecordV1 } from '../audit/schema.js';
import type { IdentityRecord, PendingTransfer, TransferHistoryEntry } from './identity.js';
import type { AuditLogStore, KeyedStore, RecordStore, StoreTx } from './store.js';

const DELETED = Symbol('deleted');

class StagedKeyedStore<V> implements KeyedStore<V> {
    private readonly staged = new Map<Owner, V | typeof DELETED>();

    constructor(private readonly committed: Map<Owner, V>) { }

    async get(owner: Owner): Promise<V | null> {
        const staged = this.staged.get(owner);
        if (staged === DELETED) return null;
        if (staged !== undefined) return staged;
        return this.committed.get(owner) ?? null;
    }

    async set(owner: Owner, value: V): Promise<void> {
        this.staged.set(owner, value);
    }

    async delete(owner: Owner): Promise<void> {
        this.staged.set(owner, DELETED);
    }

    publish(): void {
        for (const [owner, value] of this.staged) {
            if (value === DELETED) {
                this.committed.delete(owner);
            } else {
                this.committed.set(owner, value);
            }
        }
    }
}

class StagedAuditLog implements AuditLogStore {
    private readonly appended: RegistryAuditRecordV1[] = [];

    constructor(private readonly committed: RegistryAuditRecordV1[]) { }

    async lastHash(): Promise<string | null> {
        const last = this.appended.at(-1) ?? this.committed.at(-1);
        return last ? last.integrity.hash : null;
    }

    async append(record: RegistryAuditRecordV1): Promise<void> {
        this.appended.push(Object.freeze(record));
    }

    async list(): Promise<readonly RegistryAuditRecordV1[]> {
        return [...this.committed, ...this.appended];
    }

    publish(): void {
        this.committed.push(...this.appended);
    }
}

export class MemoryRecordStore implements RecordStore {
    private readonly identities = new Map<Owner, IdentityRecord>();
    private readonly pendingTransfers = new Map<Owner, PendingTransfer>();
    private readonly transferHistory = new Map<Owner, readonly TransferHistoryEntry[]>();
    private readonly auditRecords: RegistryAuditRecordV1[] = [];

    private tail: Promise<unknown> = Promise.resolve();
    private closed = false;

    transaction<T>(work: (tx: StoreTx) => Promise<T>): Promise<T> {
        if (this.closed) {
            return Promise.reject(new Error('MemoryRecordStore is closed'));
        }

        const run = this.tail.then(() => this.runIsolated(work));
        // Keep the queue moving; the caller still observes the rejection through run
        this.tail = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    async close(): Promise<void> {
        this.closed = true;
        await this.tail;
    }

    private async runIsolated<T>(work: (tx: StoreTx) => Promise<T>): Promise<T> {
        const identities = new StagedKeyedStore(this.identities);
        const pendingTransfers = new StagedKeyedStore(this.pendingTransfers);
        const transferHistory = new StagedKeyedStore(this.transferHistory);
        const auditLog = new StagedAuditLog(this.auditRecords);

        const result = await work({ identities, pendingTransfers, transferHistory, auditLog });

        identities.publish();
        pendingTransfers.publish();
        transferHistory.publish();
        auditLog.publish();
        return result;
    }
}
