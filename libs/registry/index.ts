/**
 * Tessera Registry Library
 *
 * Public exports for the DID identity registry.
 */

// Types
export type {
    IdentityRecord,
    PendingTransfer,
    TransferHistoryEntry,
    OrphanPolicy
} from './identity.js';
export {
    MAX_CREDENTIALS,
    MAX_TRANSFER_HISTORY,
    TRANSFER_WINDOW,
    DID_PREFIX
} from './identity.js';
export type { LedgerContext, Owner, Height } from '../context/ledgerContext.js';
export { ledgerContext } from '../context/ledgerContext.js';

// Errors
export type { RegistryErrorCode, RegistryResult } from './errors.js';
export { REGISTRY_ERROR_CODES, REGISTRY_ERROR_NUMBERS, RegistryError } from './errors.js';

// Stores
export type { RecordStore, StoreTx, KeyedStore, AuditLogStore } from './store.js';
export { MemoryRecordStore } from './memoryStore.js';
export { PgRecordStore } from './pgStore.js';

// Service
export type { IdentityRegistryOptions } from './registry.js';
export { IdentityRegistry } from './registry.js';

// Commands
export type { CommandOutcome, CommandValue } from './commands.js';
export { dispatchCommand, executeCommand, parseCommandEnvelope } from './commands.js';
