/**
 * Tessera Credential Vault
 *
 * Bounded, append-only credential list on the identity record. A full vault
 * rejects further credentials; nothing is ever dropped or rotated out.
 */

import type { LedgerContext } from '../context/ledgerContext.js';
import type { RegistryEvent } from '../audit/schema.js';
import { CredentialSchema } from '../validation/schema.js';
import { requireIdentity } from './didRegistry.js';
import { reject } from './errors.js';
import { freezeRecord, IdentityRecord, MAX_CREDENTIALS } from './identity.js';
import type { StoreTx } from './store.js';

export async function addCredential(
    tx: StoreTx,
    context: LedgerContext,
    credential: string
): Promise<RegistryEvent> {
    const { caller, height } = context;
    const record = await requireIdentity(tx, caller);

    if (!record.isActive) {
        reject('DEACTIVATED');
    }
    if (!CredentialSchema.safeParse(credential).success) {
        reject('INVALID_CREDENTIAL_FORMAT');
    }
    if (record.credentials.length >= MAX_CREDENTIALS) {
        reject('MAX_CREDENTIALS');
    }

    await tx.identities.set(caller, freezeRecord({
        ...record,
        credentials: [...record.credentials, credential],
        updatedAt: height
    }));

    return {
        type: 'CREDENTIAL_ADDED',
        subject: caller,
        details: { position: record.credentials.length }
    };
}

/**
 * Membership test: exact string match against an active record.
 */
export function holdsCredential(record: IdentityRecord | null, credential: string): boolean {
    return record !== null && record.isActive && record.credentials.includes(credential);
}
