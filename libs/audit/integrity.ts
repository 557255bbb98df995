import { RegistryAuditRecordV1 } from "./schema.js";
import { GENESIS_HASH } from "./schema.js";
import crypto from "crypto";

export interface AuditChainVerification {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
}

export type AuditRecordContents = Omit<RegistryAuditRecordV1, 'integrity'>;

/**
 * Fixed field order with sorted detail keys. JSONB storage does not keep
 * key order, so the hash input cannot depend on it.
 */
function canonicalize(contents: AuditRecordContents): string {
    const details = Object.fromEntries(
        Object.entries(contents.details).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );
    return JSON.stringify({
        eventId: contents.eventId,
        eventType: contents.eventType,
        recordedAt: contents.recordedAt,
        caller: contents.caller,
        height: contents.height,
        subject: contents.subject,
        details
    });
}

export function computeRecordHash(contents: AuditRecordContents, prevHash: string): string {
    return crypto.createHash("sha256")
        .update(canonicalize(contents) + prevHash)
        .digest("hex");
}

/**
 * Audit Integrity Verifier
 * Validates the cryptographic chain of registry audit records, oldest first.
 */
export function verifyAuditChain(records: readonly RegistryAuditRecordV1[]): AuditChainVerification {
    let lastHash = GENESIS_HASH;

    for (const [i, record] of records.entries()) {
        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        // Remove integrity field to reconstruct the content that was hashed
        const { integrity, ...contentsOnly } = record;
        const computedHash = computeRecordHash(contentsOnly, integrity.prevHash);

        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}
