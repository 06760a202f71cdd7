import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/cipherErrors.js';

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: ConfigEnv) => boolean; message: string }
    | { type: 'assert'; check: (env: ConfigEnv) => boolean; message: string };

/**
 * Configuration Guard
 * Evaluates every rule, then fails once with the full list of violations.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: ConfigEnv = process.env): void {
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

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check CIPHER_* environment variables."
            }, "Configuration Guard Violation");

            throw new ConfigurationError(errors);
        }

        logger.debug("Configuration guard passed.");
    }
}
