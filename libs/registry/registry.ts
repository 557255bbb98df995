/**
 * Tessera Identity Registry Service
 *
 * Public operation surface. Each operation is one store transaction:
 * - mutations commit all writes plus one audit record, or nothing
 * - rejections come back as { success: false, reason } with no state change
 * - reads never reject; missing data is null, false or []
 *
 * Store faults are not registry outcomes and are rethrown as TesseraError.
 */

import type { Height, LedgerContext, Owner } from '../context/ledgerContext.js';
import type { RegistryEvent } from '../audit/schema.js';
import { auditLogger, RegistryAuditLogger } from '../audit/logger.js';
import { AuditChainVerification, verifyAuditChain } from '../audit/integrity.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getContextLogger, logger } from '../logging/logger.js';
import { holdsCredential, addCredential } from './credentialVault.js';
import { createDid, revokeDid } from './didRegistry.js';
import { RegistryError, RegistryResult } from './errors.js';
import type {
    IdentityRecord,
    OrphanPolicy,
    PendingTransfer,
    TransferHistoryEntry
} from './identity.js';
import { deactivateDid, isActive, reactivateDid } from './lifecycle.js';
import type { RecordStore, StoreTx } from './store.js';
import { acceptTransfer, cancelTransfer, hasExpired, initiateTransfer } from './transferCoordinator.js';
import { readHistory } from './transferHistory.js';

export interface IdentityRegistryOptions {
    store: RecordStore;
    /** Defaults to 'preserve' */
    orphanPolicy?: OrphanPolicy;
    auditLogger?: RegistryAuditLogger;
}

export class IdentityRegistry {
    private readonly store: RecordStore;
    private readonly orphanPolicy: OrphanPolicy;
    private readonly audit: RegistryAuditLogger;

    constructor(options: IdentityRegistryOptions) {
        this.store = options.store;
        this.orphanPolicy = options.orphanPolicy ?? 'preserve';
        this.audit = options.auditLogger ?? auditLogger;
    }

    // --- Identity Registry ---

    createDid(context: LedgerContext, did: string): Promise<RegistryResult> {
        return this.mutate(context, 'createDid', tx => createDid(tx, context, did));
    }

    getDid(owner: Owner): Promise<IdentityRecord | null> {
        return this.read('getDid', tx => tx.identities.get(owner));
    }

    revokeDid(context: LedgerContext): Promise<RegistryResult> {
        return this.mutate(context, 'revokeDid', tx => revokeDid(tx, context, this.orphanPolicy));
    }

    // --- Credential Vault ---

    addCredential(context: LedgerContext, credential: string): Promise<RegistryResult> {
        return this.mutate(context, 'addCredential', tx => addCredential(tx, context, credential));
    }

    verifyCredential(owner: Owner, credential: string): Promise<boolean> {
        return this.read('verifyCredential', async tx => holdsCredential(await tx.identities.get(owner), credential));
    }

    // --- Lifecycle Manager ---

    deactivateDid(context: LedgerContext, reason: string | null = null): Promise<RegistryResult> {
        return this.mutate(context, 'deactivateDid', tx => deactivateDid(tx, context, reason));
    }

    reactivateDid(context: LedgerContext): Promise<RegistryResult> {
        return this.mutate(context, 'reactivateDid', tx => reactivateDid(tx, context));
    }

    isDidActive(owner: Owner): Promise<boolean> {
        return this.read('isDidActive', async tx => isActive(await tx.identities.get(owner)));
    }

    // --- Transfer Coordinator ---

    initiateTransfer(context: LedgerContext, newOwner: Owner): Promise<RegistryResult> {
        return this.mutate(context, 'initiateTransfer', tx => initiateTransfer(tx, context, newOwner));
    }

    cancelTransfer(context: LedgerContext): Promise<RegistryResult> {
        return this.mutate(context, 'cancelTransfer', tx => cancelTransfer(tx, context));
    }

    acceptTransfer(context: LedgerContext, currentOwner: Owner): Promise<RegistryResult> {
        return this.mutate(context, 'acceptTransfer', tx => acceptTransfer(tx, context, currentOwner));
    }

    getPendingTransfer(owner: Owner): Promise<PendingTransfer | null> {
        return this.read('getPendingTransfer', tx => tx.pendingTransfers.get(owner));
    }

    isTransferExpired(owner: Owner, height: Height): Promise<boolean> {
        return this.read('isTransferExpired', async tx => hasExpired(await tx.pendingTransfers.get(owner), height));
    }

    // --- Transfer History Log ---

    getTransferHistory(owner: Owner): Promise<readonly TransferHistoryEntry[]> {
        return this.read('getTransferHistory', tx => readHistory(tx, owner));
    }

    // --- Audit ---

    async verifyAuditTrail(): Promise<AuditChainVerification> {
        const records = await this.read('verifyAuditTrail', tx => tx.auditLog.list());
        const verification = verifyAuditChain(records);
        if (!verification.valid) {
            logger.error({ verification }, 'Registry audit chain verification failed');
        }
        return verification;
    }

    private async mutate(
        context: LedgerContext,
        operation: string,
        apply: (tx: StoreTx) => Promise<RegistryEvent>
    ): Promise<RegistryResult> {
        const ctxLogger = getContextLogger(context);

        try {
            const event = await this.store.transaction(async tx => {
                const applied = await apply(tx);
                try {
                    await this.audit.log(tx.auditLog, context, applied);
                } catch (err) {
                    throw ErrorSanitizer.sanitize(err, `RegistryAuditLogger:${operation}`, 'AUDIT');
                }
                return applied;
            });

            ctxLogger.info({ operation, event: event.type, subject: event.subject }, 'Registry mutation committed');
            return { success: true };
        } catch (err) {
            if (err instanceof RegistryError) {
                ctxLogger.warn({ operation, reason: err.code }, 'Registry mutation rejected');
                return { success: false, reason: err.code };
            }
            throw ErrorSanitizer.sanitize(err, `IdentityRegistry:${operation}`);
        }
    }

    private async read<T>(operation: string, query: (tx: StoreTx) => Promise<T>): Promise<T> {
        try {
            return await this.store.transaction(query);
        } catch (err) {
            throw ErrorSanitizer.sanitize(err, `IdentityRegistry:${operation}`);
        }
    }
}
