/**
 * Registry node line protocol.
 *
 * One JSON command envelope per input line, one JSON response per output line,
 * in the same order.
 */

import { dispatchCommand, CommandOutcome } from "../../../libs/registry/commands.js";
import type { IdentityRegistry } from "../../../libs/registry/registry.js";
import { TesseraError } from "../../../libs/errors/sanitizer.js";
import { ValidationIssue, ValidationViolation } from "../../../libs/validation/zod-middleware.js";

export type LineResponse =
    | ({ ok: true } & CommandOutcome)
    | { ok: false; error: 'INVALID_COMMAND'; issues: readonly ValidationIssue[] }
    | { ok: false; error: 'INTERNAL'; incidentId: string };

export async function handleLine(registry: IdentityRegistry, line: string): Promise<LineResponse> {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch {
        return { ok: false, error: 'INVALID_COMMAND', issues: [{ path: '', message: 'Malformed JSON' }] };
    }

    try {
        const outcome = await dispatchCommand(registry, raw);
        return { ok: true, ...outcome };
    } catch (err) {
        if (err instanceof ValidationViolation) {
            return { ok: false, error: 'INVALID_COMMAND', issues: err.issues };
        }
        if (err instanceof TesseraError) {
            return { ok: false, error: 'INTERNAL', incidentId: err.incidentId };
        }
        throw err;
    }
}
