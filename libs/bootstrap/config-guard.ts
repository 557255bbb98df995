import { logger } from '../logging/logger.js';

export type Env = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

/**
 * Fail-closed configuration guard.
 * Runs before typed configuration is parsed; a violation ends the process.
 */
export class ConfigGuard {
    /**
     * Evaluates every rule and returns the violations found.
     */
    static check(rules: readonly GuardRule[], env: Env = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                errors.push(`Check failed for rule: ${message}`);
            }
        }

        return errors;
    }

    static enforce(rules: readonly GuardRule[], env: Env = process.env): void {
        const errors = ConfigGuard.check(rules, env);

        if (errors.length > 0) {
            // Log structure for machine parsing + human readability
            logger.fatal({
                errors,
                remediation: "Check environment variables."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
