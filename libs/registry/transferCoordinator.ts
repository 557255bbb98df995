/**
 * Tessera Transfer Coordinator
 *
 * Two-step ownership handshake keyed by the current owner:
 *   None → Pending → Accepted (record moves, entry removed)
 *                  → Cancelled (entry removed)
 *                  → Expired (entry stays; accept fails until cancelled)
 *
 * Expiry is evaluated lazily against the supplied height. Nothing sweeps
 * expired entries.
 */

import type { Height, LedgerContext, Owner } from '../context/ledgerContext.js';
import type { RegistryEvent } from '../audit/schema.js';
import { requireIdentity } from './didRegistry.js';
import { reject } from './errors.js';
import { freezeRecord, PendingTransfer, TRANSFER_WINDOW } from './identity.js';
import { appendHistory } from './transferHistory.js';
import type { StoreTx } from './store.js';

export function hasExpired(pending: PendingTransfer | null, height: Height): boolean {
    return pending !== null && height > pending.expiresAt;
}

export async function initiateTransfer(
    tx: StoreTx,
    context: LedgerContext,
    newOwner: Owner
): Promise<RegistryEvent> {
    const { caller, height } = context;
    const record = await requireIdentity(tx, caller);

    if (!record.isActive) {
        reject('DEACTIVATED');
    }
    if (await tx.pendingTransfers.get(caller)) {
        reject('TRANSFER_IN_PROGRESS');
    }
    if (newOwner === caller) {
        reject('SELF_TRANSFER');
    }
    if (await tx.identities.get(newOwner)) {
        reject('ALREADY_EXISTS');
    }

    const pending: PendingTransfer = Object.freeze({
        newOwner,
        initiatedAt: height,
        expiresAt: height + TRANSFER_WINDOW
    });
    await tx.pendingTransfers.set(caller, pending);

    return {
        type: 'TRANSFER_INITIATED',
        subject: caller,
        details: { newOwner, expiresAt: pending.expiresAt }
    };
}

export async function cancelTransfer(tx: StoreTx, context: LedgerContext): Promise<RegistryEvent> {
    const { caller } = context;
    const pending = await tx.pendingTransfers.get(caller);

    if (!pending) {
        reject('NO_PENDING_TRANSFER');
    }

    await tx.pendingTransfers.delete(caller);

    return {
        type: 'TRANSFER_CANCELLED',
        subject: caller,
        details: { newOwner: pending.newOwner }
    };
}

/**
 * Completes a transfer initiated by currentOwner. The record, the caller's
 * history and the pending entry change together or not at all.
 */
export async function acceptTransfer(
    tx: StoreTx,
    context: LedgerContext,
    currentOwner: Owner
): Promise<RegistryEvent> {
    const { caller, height } = context;
    const pending = await tx.pendingTransfers.get(currentOwner);

    if (!pending) {
        reject('NOT_FOUND');
    }
    const record = await requireIdentity(tx, currentOwner);

    if (caller !== pending.newOwner) {
        reject('UNAUTHORIZED');
    }
    if (!record.isActive) {
        reject('DEACTIVATED');
    }
    if (hasExpired(pending, height)) {
        reject('TRANSFER_EXPIRED');
    }

    // Overwrites any record the caller claimed after initiation
    await tx.identities.set(caller, freezeRecord({ ...record, updatedAt: height }));
    const historyLength = await appendHistory(tx, caller, {
        from: currentOwner,
        to: caller,
        timestamp: height
    });
    await tx.identities.delete(currentOwner);
    await tx.pendingTransfers.delete(currentOwner);

    return {
        type: 'TRANSFER_ACCEPTED',
        subject: caller,
        details: { from: currentOwner, did: record.did, historyLength }
    };
}
