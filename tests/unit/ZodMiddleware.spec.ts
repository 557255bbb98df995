/**
 * Unit Tests: Zod Middleware
 *
 * Tests fail-closed input validation.
 *
 * @see libs/validation/zod-middleware.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { createValidator, validate, ValidationViolation } from '../../libs/validation/zod-middleware.js';
import { CredentialSchema, DidSchema } from '../../libs/validation/schema.js';

describe('Zod Middleware', () => {
    const TestSchema = z.object({
        owner: z.string().min(1),
        height: z.number().int().nonnegative(),
        mode: z.enum(['preserve', 'cascade'])
    });

    it('should validate correct input', () => {
        const input = { owner: 'SP-ALICE', height: 42, mode: 'preserve' };

        const result = validate(TestSchema, input, 'test-context');
        assert.deepStrictEqual(result, input);
    });

    it('should reject invalid input with detailed error', () => {
        const invalidInput = { owner: '', height: -1, mode: 'shred' };

        assert.throws(
            () => validate(TestSchema, invalidInput, 'test-context'),
            (err: unknown) => {
                assert.ok(err instanceof ValidationViolation);
                assert.ok(err.message.startsWith('Validation Violation in test-context:'));
                assert.deepStrictEqual(err.issues.map(i => i.path), ['owner', 'height', 'mode']);
                return true;
            }
        );
    });

    it('should reject missing required fields', () => {
        assert.throws(
            () => validate(TestSchema, { owner: 'SP-ALICE' }, 'partial-test'),
            /Validation Violation/
        );
    });

    it('should return defaults filled in by the schema', () => {
        const WithDefault = z.object({ reason: z.string().nullable().default(null) });

        assert.deepStrictEqual(validate(WithDefault, {}, 'default-test'), { reason: null });
    });

    it('should create reusable validator factory', () => {
        const validateTest = createValidator(TestSchema);

        const valid = validateTest({ owner: 'SP-BOB', height: 7, mode: 'cascade' }, 'factory-test');

        assert.strictEqual(valid.mode, 'cascade');
    });

    describe('registry value schemas', () => {
        it('should accept DIDs up to 100 characters with the prefix', () => {
            assert.strictEqual(DidSchema.safeParse('did:stx:').success, true);
            assert.strictEqual(DidSchema.safeParse('did:stx:' + 'a'.repeat(92)).success, true);
            assert.strictEqual(DidSchema.safeParse('did:stx:' + 'a'.repeat(93)).success, false);
            assert.strictEqual(DidSchema.safeParse('did:eth:alice').success, false);
            assert.strictEqual(DidSchema.safeParse('').success, false);
        });

        it('should accept credentials of 1 to 200 characters', () => {
            assert.strictEqual(CredentialSchema.safeParse('x').success, true);
            assert.strictEqual(CredentialSchema.safeParse('x'.repeat(200)).success, true);
            assert.strictEqual(CredentialSchema.safeParse('x'.repeat(201)).success, false);
            assert.strictEqual(CredentialSchema.safeParse('').success, false);
        });
    });
});
