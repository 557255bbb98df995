/**
 * Unit Tests: Lifecycle Manager
 *
 * @see libs/registry/lifecycle.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { IdentityRegistry } from '../../libs/registry/registry.js';
import { MemoryRecordStore } from '../../libs/registry/memoryStore.js';
import { ledgerContext } from '../../libs/context/ledgerContext.js';

const ALICE = 'SP-ALICE';
const BOB = 'SP-BOB';

describe('Lifecycle Manager', () => {
    let registry: IdentityRegistry;

    beforeEach(async () => {
        registry = new IdentityRegistry({ store: new MemoryRecordStore() });
        await registry.createDid(ledgerContext(ALICE, 1), 'did:stx:alice');
    });

    it('should deactivate with a reason and refresh updatedAt', async () => {
        const result = await registry.deactivateDid(ledgerContext(ALICE, 4), 'key compromised');

        assert.deepStrictEqual(result, { success: true });
        const record = await registry.getDid(ALICE);
        assert.strictEqual(record?.isActive, false);
        assert.strictEqual(record?.revocationReason, 'key compromised');
        assert.strictEqual(record?.updatedAt, 4);
        assert.strictEqual(await registry.isDidActive(ALICE), false);
    });

    it('should deactivate without a reason', async () => {
        await registry.deactivateDid(ledgerContext(ALICE, 2));

        assert.strictEqual((await registry.getDid(ALICE))?.revocationReason, null);
    });

    it('should fail ALREADY_DEACTIVATED when deactivating twice', async () => {
        await registry.deactivateDid(ledgerContext(ALICE, 2), 'first');

        const result = await registry.deactivateDid(ledgerContext(ALICE, 3), 'second');

        assert.deepStrictEqual(result, { success: false, reason: 'ALREADY_DEACTIVATED' });
        const record = await registry.getDid(ALICE);
        assert.strictEqual(record?.revocationReason, 'first');
        assert.strictEqual(record?.updatedAt, 2);
    });

    it('should reactivate, clear the reason and keep credentials', async () => {
        await registry.addCredential(ledgerContext(ALICE, 2), 'membership:gold');
        await registry.deactivateDid(ledgerContext(ALICE, 3), 'paused');

        const result = await registry.reactivateDid(ledgerContext(ALICE, 9));

        assert.deepStrictEqual(result, { success: true });
        assert.deepStrictEqual(await registry.getDid(ALICE), {
            did: 'did:stx:alice',
            credentials: ['membership:gold'],
            createdAt: 1,
            updatedAt: 9,
            isActive: true,
            revocationReason: null
        });
    });

    it('should restore credential addition after reactivation', async () => {
        await registry.deactivateDid(ledgerContext(ALICE, 2), null);
        assert.deepStrictEqual(
            await registry.addCredential(ledgerContext(ALICE, 3), 'cred'),
            { success: false, reason: 'DEACTIVATED' }
        );

        await registry.reactivateDid(ledgerContext(ALICE, 4));

        assert.deepStrictEqual(await registry.addCredential(ledgerContext(ALICE, 5), 'cred'), { success: true });
    });

    it('should reuse ALREADY_DEACTIVATED when reactivating an active identity', async () => {
        const result = await registry.reactivateDid(ledgerContext(ALICE, 2));
        assert.deepStrictEqual(result, { success: false, reason: 'ALREADY_DEACTIVATED' });
    });

    it('should fail NOT_FOUND for owners without a record', async () => {
        assert.deepStrictEqual(
            await registry.deactivateDid(ledgerContext(BOB, 2), null),
            { success: false, reason: 'NOT_FOUND' }
        );
        assert.deepStrictEqual(
            await registry.reactivateDid(ledgerContext(BOB, 2)),
            { success: false, reason: 'NOT_FOUND' }
        );
    });

    it('should report unknown owners as inactive', async () => {
        assert.strictEqual(await registry.isDidActive(BOB), false);
        assert.strictEqual(await registry.isDidActive(ALICE), true);
    });

    it('should block transfer initiation while deactivated', async () => {
        await registry.deactivateDid(ledgerContext(ALICE, 2), null);

        const result = await registry.initiateTransfer(ledgerContext(ALICE, 3), BOB);
        assert.deepStrictEqual(result, { success: false, reason: 'DEACTIVATED' });
    });
});
