/**
 * Unit Tests: Registry Audit Trail
 *
 * Hash chaining of committed mutations and tamper detection.
 *
 * @see libs/audit/logger.ts
 * @see libs/audit/integrity.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { IdentityRegistry } from '../../libs/registry/registry.js';
import { MemoryRecordStore } from '../../libs/registry/memoryStore.js';
import { ledgerContext } from '../../libs/context/ledgerContext.js';
import { RegistryAuditLogger } from '../../libs/audit/logger.js';
import { computeRecordHash, verifyAuditChain } from '../../libs/audit/integrity.js';
import { GENESIS_HASH, RegistryAuditRecordV1, RegistryEvent } from '../../libs/audit/schema.js';
import type { LedgerContext } from '../../libs/context/ledgerContext.js';
import type { AuditLogStore } from '../../libs/registry/store.js';
import { TesseraError } from '../../libs/errors/sanitizer.js';

const ALICE = 'SP-ALICE';
const BOB = 'SP-BOB';
const FIXED_TIME = new Date('2026-01-01T00:00:00.000Z');

describe('Registry Audit Trail', () => {
    let store: MemoryRecordStore;
    let registry: IdentityRegistry;

    const auditRecords = (): Promise<readonly RegistryAuditRecordV1[]> =>
        store.transaction(tx => tx.auditLog.list());

    beforeEach(() => {
        store = new MemoryRecordStore();
        registry = new IdentityRegistry({
            store,
            auditLogger: new RegistryAuditLogger(() => FIXED_TIME)
        });
    });

    it('should start the chain at the genesis hash', async () => {
        await registry.createDid(ledgerContext(ALICE, 5), 'did:stx:alice');

        const [record] = await auditRecords();
        assert.ok(record);
        assert.strictEqual(record.eventType, 'DID_CREATED');
        assert.strictEqual(record.caller, ALICE);
        assert.strictEqual(record.subject, ALICE);
        assert.strictEqual(record.height, 5);
        assert.strictEqual(record.recordedAt, '2026-01-01T00:00:00.000Z');
        assert.deepStrictEqual(record.details, { did: 'did:stx:alice' });
        assert.strictEqual(record.integrity.prevHash, GENESIS_HASH);
        assert.match(record.integrity.hash, /^[0-9a-f]{64}$/);
    });

    it('should record one event per committed mutation, linked in order', async () => {
        await registry.createDid(ledgerContext(ALICE, 1), 'did:stx:alice');
        await registry.addCredential(ledgerContext(ALICE, 2), 'kyc:passed');
        await registry.initiateTransfer(ledgerContext(ALICE, 3), BOB);
        await registry.acceptTransfer(ledgerContext(BOB, 4), ALICE);

        const records = await auditRecords();

        assert.deepStrictEqual(records.map(r => r.eventType), [
            'DID_CREATED',
            'CREDENTIAL_ADDED',
            'TRANSFER_INITIATED',
            'TRANSFER_ACCEPTED'
        ]);
        assert.deepStrictEqual(records[1]?.details, { position: 0 });
        assert.deepStrictEqual(records[2]?.details, { newOwner: BOB, expiresAt: 147 });
        assert.deepStrictEqual(records[3]?.details, { from: ALICE, did: 'did:stx:alice', historyLength: 1 });
        for (let i = 1; i < records.length; i++) {
            assert.strictEqual(records[i]?.integrity.prevHash, records[i - 1]?.integrity.hash);
        }
        assert.deepStrictEqual(await registry.verifyAuditTrail(), { valid: true });
    });

    it('should not record rejected mutations', async () => {
        await registry.createDid(ledgerContext(ALICE, 1), 'did:stx:alice');
        await registry.createDid(ledgerContext(ALICE, 2), 'did:stx:again');
        await registry.revokeDid(ledgerContext(BOB, 3));

        assert.strictEqual((await auditRecords()).length, 1);
    });

    it('should report a broken link', async () => {
        await registry.createDid(ledgerContext(ALICE, 1), 'did:stx:alice');
        await registry.createDid(ledgerContext(BOB, 2), 'did:stx:bob');
        const [first, second] = await auditRecords();
        assert.ok(first && second);

        const relinked = { ...second, integrity: { ...second.integrity, prevHash: GENESIS_HASH } };
        const result = verifyAuditChain([first, relinked]);

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 1);
        assert.strictEqual(
            result.reason,
            `Chain broken at record 1: prevHash mismatch. Expected ${first.integrity.hash}, found ${GENESIS_HASH}`
        );
    });

    it('should report edited contents', async () => {
        await registry.createDid(ledgerContext(ALICE, 1), 'did:stx:alice');
        const [record] = await auditRecords();
        assert.ok(record);

        const edited = { ...record, details: { did: 'did:stx:mallory' } };
        const result = verifyAuditChain([edited]);

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 0);
        assert.ok(result.reason?.startsWith('Integrity violation at record 0: hash mismatch.'));
    });

    it('should hash detail keys independently of their order', () => {
        const base = {
            eventId: '00000000-0000-4000-8000-000000000000',
            eventType: 'TRANSFER_ACCEPTED' as const,
            recordedAt: FIXED_TIME.toISOString(),
            caller: BOB,
            height: 4,
            subject: BOB
        };

        const forward = computeRecordHash({ ...base, details: { from: ALICE, did: 'did:stx:alice' } }, GENESIS_HASH);
        const reversed = computeRecordHash({ ...base, details: { did: 'did:stx:alice', from: ALICE } }, GENESIS_HASH);

        assert.strictEqual(forward, reversed);
        assert.notStrictEqual(forward, computeRecordHash({ ...base, details: { from: ALICE } }, GENESIS_HASH));
    });

    it('should roll back the mutation when the audit append fails', async () => {
        class FailingAuditLogger extends RegistryAuditLogger {
            override async log(
                _auditLog: AuditLogStore,
                _context: LedgerContext,
                _event: RegistryEvent
            ): Promise<RegistryAuditRecordV1> {
                throw new Error('audit table unavailable');
            }
        }
        const failing = new IdentityRegistry({ store, auditLogger: new FailingAuditLogger() });

        await assert.rejects(
            failing.createDid(ledgerContext(ALICE, 1), 'did:stx:alice'),
            (err: unknown) => {
                assert.ok(err instanceof TesseraError);
                assert.strictEqual(err.category, 'AUDIT');
                assert.strictEqual(err.contextLabel, 'RegistryAuditLogger:createDid');
                return true;
            }
        );
        assert.strictEqual(await registry.getDid(ALICE), null);
        assert.strictEqual((await auditRecords()).length, 0);
    });

    it('should accept an empty chain', () => {
        assert.deepStrictEqual(verifyAuditChain([]), { valid: true });
    });
});
