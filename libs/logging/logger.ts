import pino from "pino";
import { z } from "zod";
import { LedgerContext } from "../context/ledgerContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Level used before configuration is loaded. An unknown value falls back to
 * info here; configuration loading rejects it afterwards.
 */
export function resolveBootLogLevel(raw: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(raw);
  return parsed.success ? parsed.data : "info";
}

/**
 * Standard output carries the registry node's response stream,
 * so log lines go to stderr.
 */
export const logger = pino({
  level: resolveBootLogLevel(process.env.LOG_LEVEL),
  base: {
    system: "tessera"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
}, pino.destination(2));

/**
 * Returns a child logger with ledger context attached.
 */
export function getContextLogger(context: LedgerContext) {
  return logger.child({
    caller: context.caller,
    height: context.height
  });
}
