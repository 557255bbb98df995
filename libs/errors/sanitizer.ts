import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Infrastructure Fault Wrapping
 * Store and database faults are not registry outcomes. They are wrapped in a
 * generic message with a unique IncidentID for log correlation.
 */

/** STORE: record store and database faults. AUDIT: audit chain append faults. */
export type TesseraErrorCategory = 'STORE' | 'AUDIT';

export class TesseraError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: TesseraErrorCategory = 'STORE',
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'TesseraError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized TesseraError.
     */
    sanitize: (err: unknown, contextLabel: string, category: TesseraErrorCategory = 'STORE'): TesseraError => {
        if (err instanceof TesseraError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            if ('code' in err && typeof err.code === 'string') {
                sqlState = err.code;
            }
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new TesseraError(
            `An internal registry error occurred. Reference: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            category,
            { cause: err, contextLabel, sqlState }
        );
    }
};
