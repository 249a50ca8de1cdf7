import { logger } from '../logging/logger.js';

export type Environment = Record<string, string | undefined>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: Environment) => boolean; message: string }
    | { type: 'assert'; check: (env: Environment) => boolean; message: string };

/**
 * Raised when one or more guard rules fail. Carries every violation, not
 * just the first.
 */
export class ConfigurationError extends Error {
    readonly code = 'CONFIG_VIOLATION';

    constructor(public readonly violations: readonly string[]) {
        super(`Configuration Guard Violation: ${violations.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Fail-closed configuration guard.
 * No silent defaults for required values; every violation is collected.
 */
export class ConfigGuard {
    static evaluate(rules: readonly GuardRule[], env: Environment = process.env): string[] {
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
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        return errors;
    }

    static enforce(rules: readonly GuardRule[], env: Environment = process.env): void {
        const errors = ConfigGuard.evaluate(rules, env);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables. No defaults allowed for required values."
            }, "Configuration Guard Violation");

            throw new ConfigurationError(errors);
        }

        logger.info("Configuration guard passed.");
    }
}
