/**
 * Tessera Transfer History Log
 *
 * Per-recipient, append-only, capacity MAX_TRANSFER_HISTORY. An append past
 * capacity rejects with HISTORY_FULL and aborts the enclosing transaction.
 */

import type { Owner } from '../context/ledgerContext.js';
import { reject } from './errors.js';
import { MAX_TRANSFER_HISTORY, TransferHistoryEntry } from './identity.js';
import type { StoreTx } from './store.js';

export async function readHistory(tx: StoreTx, owner: Owner): Promise<readonly TransferHistoryEntry[]> {
    return (await tx.transferHistory.get(owner)) ?? [];
}

export async function appendHistory(
    tx: StoreTx,
    owner: Owner,
    entry: TransferHistoryEntry
): Promise<number> {
    const history = await readHistory(tx, owner);

    if (history.length >= MAX_TRANSFER_HISTORY) {
        reject('HISTORY_FULL');
    }

    const next = Object.freeze([...history, Object.freeze({ ...entry })]);
    await tx.transferHistory.set(owner, next);
    return next.length;
}
