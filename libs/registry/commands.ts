/**
 * Tessera Command Dispatch
 *
 * Routes a validated command envelope to the registry. The envelope's caller
 * and height are supplied by the ledger host, never by the end user.
 */

import { ledgerContext } from '../context/ledgerContext.js';
import { CommandEnvelope, CommandEnvelopeSchema, CommandOp } from '../validation/schema.js';
import { createValidator } from '../validation/zod-middleware.js';
import type { RegistryResult } from './errors.js';
import type { IdentityRecord, PendingTransfer, TransferHistoryEntry } from './identity.js';
import type { IdentityRegistry } from './registry.js';

export type CommandValue =
    | RegistryResult
    | IdentityRecord
    | PendingTransfer
    | readonly TransferHistoryEntry[]
    | boolean
    | null;

export interface CommandOutcome {
    op: CommandOp;
    value: CommandValue;
}

const validateEnvelope = createValidator(CommandEnvelopeSchema);

/**
 * Validates raw input as a command envelope.
 * @throws ValidationViolation when the envelope is malformed
 */
export function parseCommandEnvelope(raw: unknown): CommandEnvelope {
    return validateEnvelope(raw, 'Registry:CommandEnvelope');
}

export async function executeCommand(
    registry: IdentityRegistry,
    envelope: CommandEnvelope
): Promise<CommandOutcome> {
    const context = ledgerContext(envelope.caller, envelope.height);
    const { command } = envelope;

    switch (command.op) {
        case 'create-did':
            return { op: command.op, value: await registry.createDid(context, command.did) };
        case 'get-did':
            return { op: command.op, value: await registry.getDid(command.owner) };
        case 'revoke-did':
            return { op: command.op, value: await registry.revokeDid(context) };
        case 'add-credential':
            return { op: command.op, value: await registry.addCredential(context, command.credential) };
        case 'verify-credential':
            return { op: command.op, value: await registry.verifyCredential(command.owner, command.credential) };
        case 'deactivate-did':
            return { op: command.op, value: await registry.deactivateDid(context, command.reason) };
        case 'reactivate-did':
            return { op: command.op, value: await registry.reactivateDid(context) };
        case 'is-did-active':
            return { op: command.op, value: await registry.isDidActive(command.owner) };
        case 'initiate-transfer':
            return { op: command.op, value: await registry.initiateTransfer(context, command.newOwner) };
        case 'cancel-transfer':
            return { op: command.op, value: await registry.cancelTransfer(context) };
        case 'accept-transfer':
            return { op: command.op, value: await registry.acceptTransfer(context, command.currentOwner) };
        case 'get-pending-transfer':
            return { op: command.op, value: await registry.getPendingTransfer(command.owner) };
        case 'is-transfer-expired':
            return { op: command.op, value: await registry.isTransferExpired(command.owner, context.height) };
        case 'get-transfer-history':
            return { op: command.op, value: await registry.getTransferHistory(command.owner) };
    }
}

export async function dispatchCommand(registry: IdentityRegistry, raw: unknown): Promise<CommandOutcome> {
    return executeCommand(registry, parseCommandEnvelope(raw));
}
