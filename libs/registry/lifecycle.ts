/**
 * Tessera Lifecycle Manager
 *
 * Active ⇄ Deactivated, reversible. Removal is revokeDid. A deactivated
 * identity accepts no mutation other than reactivation and revocation.
 */

import type { LedgerContext } from '../context/ledgerContext.js';
import type { RegistryEvent } from '../audit/schema.js';
import { requireIdentity } from './didRegistry.js';
import { reject } from './errors.js';
import { freezeRecord, IdentityRecord } from './identity.js';
import type { StoreTx } from './store.js';

export async function deactivateDid(
    tx: StoreTx,
    context: LedgerContext,
    reason: string | null
): Promise<RegistryEvent> {
    const { caller, height } = context;
    const record = await requireIdentity(tx, caller);

    if (!record.isActive) {
        reject('ALREADY_DEACTIVATED');
    }

    await tx.identities.set(caller, freezeRecord({
        ...record,
        isActive: false,
        revocationReason: reason,
        updatedAt: height
    }));

    return {
        type: 'DID_DEACTIVATED',
        subject: caller,
        details: { reasonProvided: reason !== null }
    };
}

export async function reactivateDid(tx: StoreTx, context: LedgerContext): Promise<RegistryEvent> {
    const { caller, height } = context;
    const record = await requireIdentity(tx, caller);

    // Same code as the opposite direction: "already in the requested state"
    if (record.isActive) {
        reject('ALREADY_DEACTIVATED');
    }

    await tx.identities.set(caller, freezeRecord({
        ...record,
        isActive: true,
        revocationReason: null,
        updatedAt: height
    }));

    return { type: 'DID_REACTIVATED', subject: caller, details: {} };
}

export function isActive(record: IdentityRecord | null): boolean {
    return record?.isActive ?? false;
}
