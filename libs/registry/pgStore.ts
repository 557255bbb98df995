/**
 * PostgreSQL record store.
 *
 * Every transaction first takes one transaction-scoped advisory lock, which
 * makes the lock the single sequence point for all registry writes
 * (acceptTransfer spans three tables). The lock call must stay the first
 * statement under READ COMMITTED: each later statement then reads what the
 * previous holder committed. All queries are parameterized with explicit
 * column lists.
 */

import type { Pool, PoolClient } from 'pg';
import type { Owner } from '../context/ledgerContext.js';
import type { RegistryAuditRecordV1 } from '../audit/schema.js';
import { logger } from '../logging/logger.js';
import type { IdentityRecord, PendingTransfer, TransferHistoryEntry } from './identity.js';
import { freezeRecord } from './identity.js';
import type { AuditLogStore, KeyedStore, RecordStore, StoreTx } from './store.js';

/** Advisory lock key shared by every registry transaction. */
export const REGISTRY_LOCK_KEY = 7_300_144;

interface IdentityRow {
    owner: string;
    did: string;
    credentials: string[];
    created_at: string;
    updated_at: string;
    is_active: boolean;
    revocation_reason: string | null;
}

interface PendingTransferRow {
    owner: string;
    new_owner: string;
    initiated_at: string;
    expires_at: string;
}

interface TransferHistoryRow {
    owner: string;
    entries: TransferHistoryEntry[];
}

interface AuditRow {
    record: RegistryAuditRecordV1;
}

function mapRowToIdentity(row: IdentityRow): IdentityRecord {
    return freezeRecord({
        did: row.did,
        credentials: row.credentials,
        createdAt: Number(row.created_at),
        updatedAt: Number(row.updated_at),
        isActive: row.is_active,
        revocationReason: row.revocation_reason
    });
}

function mapRowToPendingTransfer(row: PendingTransferRow): PendingTransfer {
    return Object.freeze({
        newOwner: row.new_owner,
        initiatedAt: Number(row.initiated_at),
        expiresAt: Number(row.expires_at)
    });
}

class PgIdentityStore implements KeyedStore<IdentityRecord> {
    constructor(private readonly client: PoolClient) { }

    async get(owner: Owner): Promise<IdentityRecord | null> {
        const result = await this.client.query<IdentityRow>(
            `SELECT owner, did, credentials, created_at, updated_at, is_active, revocation_reason
             FROM identities
             WHERE owner = $1
             LIMIT 1`,
            [owner]
        );
        const row = result.rows[0];
        return row ? mapRowToIdentity(row) : null;
    }

    async set(owner: Owner, value: IdentityRecord): Promise<void> {
        await this.client.query(
            `INSERT INTO identities (owner, did, credentials, created_at, updated_at, is_active, revocation_reason)
             VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7)
             ON CONFLICT (owner) DO UPDATE SET
                did = EXCLUDED.did,
                credentials = EXCLUDED.credentials,
                created_at = EXCLUDED.created_at,
                updated_at = EXCLUDED.updated_at,
                is_active = EXCLUDED.is_active,
                revocation_reason = EXCLUDED.revocation_reason`,
            [
                owner,
                value.did,
                JSON.stringify(value.credentials),
                value.createdAt,
                value.updatedAt,
                value.isActive,
                value.revocationReason
            ]
        );
    }

    async delete(owner: Owner): Promise<void> {
        await this.client.query('DELETE FROM identities WHERE owner = $1', [owner]);
    }
}

class PgPendingTransferStore implements KeyedStore<PendingTransfer> {
    constructor(private readonly client: PoolClient) { }

    async get(owner: Owner): Promise<PendingTransfer | null> {
        const result = await this.client.query<PendingTransferRow>(
            `SELECT owner, new_owner, initiated_at, expires_at
             FROM pending_transfers
             WHERE owner = $1
             LIMIT 1`,
            [owner]
        );
        const row = result.rows[0];
        return row ? mapRowToPendingTransfer(row) : null;
    }

    async set(owner: Owner, value: PendingTransfer): Promise<void> {
        await this.client.query(
            `INSERT INTO pending_transfers (owner, new_owner, initiated_at, expires_at)
             VALUES ($1, $2, $3, $4)
             ON CONFLICT (owner) DO UPDATE SET
                new_owner = EXCLUDED.new_owner,
                initiated_at = EXCLUDED.initiated_at,
                expires_at = EXCLUDED.expires_at`,
            [owner, value.newOwner, value.initiatedAt, value.expiresAt]
        );
    }

    async delete(owner: Owner): Promise<void> {
        await this.client.query('DELETE FROM pending_transfers WHERE owner = $1', [owner]);
    }
}

class PgTransferHistoryStore implements KeyedStore<readonly TransferHistoryEntry[]> {
    constructor(private readonly client: PoolClient) { }

    async get(owner: Owner): Promise<readonly TransferHistoryEntry[] | null> {
        const result = await this.client.query<TransferHistoryRow>(
            `SELECT owner, entries
             FROM transfer_history
             WHERE owner = $1
             LIMIT 1`,
            [owner]
        );
        const row = result.rows[0];
        return row ? Object.freeze(row.entries.map(entry => Object.freeze({ ...entry }))) : null;
    }

    async set(owner: Owner, value: readonly TransferHistoryEntry[]): Promise<void> {
        await this.client.query(
            `INSERT INTO transfer_history (owner, entries)
             VALUES ($1, $2::jsonb)
             ON CONFLICT (owner) DO UPDATE SET entries = EXCLUDED.entries`,
            [owner, JSON.stringify(value)]
        );
    }

    async delete(owner: Owner): Promise<void> {
        await this.client.query('DELETE FROM transfer_history WHERE owner = $1', [owner]);
    }
}

class PgAuditLogStore implements AuditLogStore {
    constructor(private readonly client: PoolClient) { }

    async lastHash(): Promise<string | null> {
        const result = await this.client.query<{ last_hash: string }>(
            `SELECT record->'integrity'->>'hash' AS last_hash
             FROM registry_audit_log
             ORDER BY seq DESC
             LIMIT 1`
        );
        return result.rows[0]?.last_hash ?? null;
    }

    async append(record: RegistryAuditRecordV1): Promise<void> {
        await this.client.query(
            `INSERT INTO registry_audit_log (event_id, event_type, caller, subject, height, record)
             VALUES ($1, $2, $3, $4, $5, $6::jsonb)`,
            [
                record.eventId,
                record.eventType,
                record.caller,
                record.subject,
                record.height,
                JSON.stringify(record)
            ]
        );
    }

    async list(): Promise<readonly RegistryAuditRecordV1[]> {
        const result = await this.client.query<AuditRow>(
            'SELECT record FROM registry_audit_log ORDER BY seq ASC'
        );
        return result.rows.map(row => row.record);
    }
}

export class PgRecordStore implements RecordStore {
    constructor(private readonly pool: Pool) { }

    async transaction<T>(work: (tx: StoreTx) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        let forceDestroy = false;

        try {
            await client.query('BEGIN');
            await client.query('SELECT pg_advisory_xact_lock($1)', [REGISTRY_LOCK_KEY]);

            const result = await work({
                identities: new PgIdentityStore(client),
                pendingTransfers: new PgPendingTransferStore(client),
                transferHistory: new PgTransferHistoryStore(client),
                auditLog: new PgAuditLogStore(client)
            });

            await client.query('COMMIT');
            return result;
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                forceDestroy = true;
                logger.error({ error: rollbackError }, '[DB] Failed to rollback registry transaction');
            }
            throw error;
        } finally {
            if (forceDestroy) {
                client.release(new Error('[DB] Forcing client destroy after failed rollback'));
            } else {
                client.release();
            }
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
