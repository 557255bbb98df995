import { GENESIS_HASH, RegistryAuditRecordV1, RegistryEvent } from "./schema.js";
import { computeRecordHash } from "./integrity.js";
import { LedgerContext } from "../context/ledgerContext.js";
import { logger } from "../logging/logger.js";
import type { AuditLogStore } from "../registry/store.js";
import crypto from "crypto";

/**
 * Registry Audit Logger
 * Chains each committed mutation to the previous record. Appends go through
 * the transaction's audit log, so a record exists exactly when the mutation
 * it describes was committed.
 */
export class RegistryAuditLogger {
    constructor(private readonly clock: () => Date = () => new Date()) { }

    public async log(
        auditLog: AuditLogStore,
        context: LedgerContext,
        event: RegistryEvent
    ): Promise<RegistryAuditRecordV1> {
        const prevHash = (await auditLog.lastHash()) ?? GENESIS_HASH;

        const contents = {
            eventId: crypto.randomUUID(),
            eventType: event.type,
            recordedAt: this.clock().toISOString(),
            caller: context.caller,
            height: context.height,
            subject: event.subject,
            details: event.details
        };

        const hash = computeRecordHash(contents, prevHash);
        const signedRecord: RegistryAuditRecordV1 = {
            ...contents,
            integrity: { prevHash, hash }
        };

        await auditLog.append(signedRecord);

        logger.debug({
            auditEvent: event.type,
            eventId: signedRecord.eventId,
            integrityHash: hash.substring(0, 16) + '...'
        }, "Audit record staged");

        return signedRecord;
    }
}

export const auditLogger = new RegistryAuditLogger();
