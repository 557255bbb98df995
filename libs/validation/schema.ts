import { z } from 'zod';
import {
    DID_PREFIX,
    MAX_CREDENTIAL_LENGTH,
    MAX_DID_LENGTH,
    MAX_REASON_LENGTH
} from '../registry/identity.js';

/**
 * Central schema definitions for registry inputs.
 * DID and credential rules are applied inside the registry (mapped to
 * taxonomy codes); envelope rules are applied at the command boundary.
 */

// --- Registry Value Schemas ---

export const DidSchema = z.string()
    .min(1)
    .max(MAX_DID_LENGTH)
    .startsWith(DID_PREFIX);

export const CredentialSchema = z.string()
    .min(1)
    .max(MAX_CREDENTIAL_LENGTH);

export const RevocationReasonSchema = z.string().max(MAX_REASON_LENGTH);

export const OwnerSchema = z.string().min(1).max(256);

export const HeightSchema = z.number().int().nonnegative().safe();

// --- Command Schemas ---

export const CommandSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('create-did'), did: z.string() }).strict(),
    z.object({ op: z.literal('get-did'), owner: OwnerSchema }).strict(),
    z.object({ op: z.literal('revoke-did') }).strict(),
    z.object({ op: z.literal('add-credential'), credential: z.string() }).strict(),
    z.object({ op: z.literal('verify-credential'), owner: OwnerSchema, credential: z.string() }).strict(),
    z.object({ op: z.literal('deactivate-did'), reason: RevocationReasonSchema.nullable().default(null) }).strict(),
    z.object({ op: z.literal('reactivate-did') }).strict(),
    z.object({ op: z.literal('is-did-active'), owner: OwnerSchema }).strict(),
    z.object({ op: z.literal('initiate-transfer'), newOwner: OwnerSchema }).strict(),
    z.object({ op: z.literal('cancel-transfer') }).strict(),
    z.object({ op: z.literal('accept-transfer'), currentOwner: OwnerSchema }).strict(),
    z.object({ op: z.literal('get-pending-transfer'), owner: OwnerSchema }).strict(),
    z.object({ op: z.literal('is-transfer-expired'), owner: OwnerSchema }).strict(),
    z.object({ op: z.literal('get-transfer-history'), owner: OwnerSchema }).strict()
]);

export const CommandEnvelopeSchema = z.object({
    caller: OwnerSchema,
    height: HeightSchema,
    command: CommandSchema
}).strict();

export type RegistryCommand = z.infer<typeof CommandSchema>;
export type CommandEnvelope = z.infer<typeof CommandEnvelopeSchema>;
export type CommandOp = RegistryCommand['op'];
