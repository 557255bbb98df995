import { z, ZodTypeAny } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

/**
 * Raised when input fails schema validation at a boundary.
 */
export class ValidationViolation extends Error {
    constructor(
        public readonly context: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationViolation';
    }
}

/**
 * Validates data against a schema and throws a strictly typed error on failure.
 * Used for fail-closed validation of command envelopes and configuration.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Issue paths and messages only; payloads may carry credential statements
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationViolation(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
