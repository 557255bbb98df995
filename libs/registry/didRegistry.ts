/**
 * Tessera Identity Registry
 *
 * Owner → identity record. One DID per owner; DID format is checked on
 * creation and never again.
 */

import type { LedgerContext, Owner } from '../context/ledgerContext.js';
import type { RegistryEvent } from '../audit/schema.js';
import { DidSchema } from '../validation/schema.js';
import { reject } from './errors.js';
import { freezeRecord, IdentityRecord, OrphanPolicy } from './identity.js';
import type { StoreTx } from './store.js';

/**
 * Loads the caller's record or rejects with NOT_FOUND.
 */
export async function requireIdentity(tx: StoreTx, owner: Owner): Promise<IdentityRecord> {
    const record = await tx.identities.get(owner);
    return record ?? reject('NOT_FOUND');
}

export async function createDid(tx: StoreTx, context: LedgerContext, did: string): Promise<RegistryEvent> {
    const { caller, height } = context;

    if (await tx.identities.get(caller)) {
        reject('ALREADY_EXISTS');
    }
    if (!DidSchema.safeParse(did).success) {
        reject('INVALID_DID_FORMAT');
    }

    await tx.identities.set(caller, freezeRecord({
        did,
        credentials: [],
        createdAt: height,
        updatedAt: height,
        isActive: true,
        revocationReason: null
    }));

    return { type: 'DID_CREATED', subject: caller, details: { did } };
}

/**
 * Permanently removes the caller's record. Pending transfer and history
 * keyed by the caller follow the orphan policy.
 */
export async function revokeDid(
    tx: StoreTx,
    context: LedgerContext,
    orphanPolicy: OrphanPolicy
): Promise<RegistryEvent> {
    const { caller } = context;
    const record = await requireIdentity(tx, caller);

    await tx.identities.delete(caller);

    if (orphanPolicy === 'cascade') {
        await tx.pendingTransfers.delete(caller);
        await tx.transferHistory.delete(caller);
    }

    return {
        type: 'DID_REVOKED',
        subject: caller,
        details: { did: record.did, orphanPolicy }
    };
}
