import { z } from 'zod';
import { ConfigEnv, ConfigGuard, GuardRule } from '../config-guard.js';
import { ConfigurationError } from '../../errors/cipherErrors.js';
import { DEFAULT_LOG_LEVEL, LogLevelSchema, logger } from '../../logging/logger.js';

export const DEFAULT_MAX_CANDIDATES = 1_000_000;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_YIELD_EVERY = 256;
export const MAX_CONCURRENCY = 64;

const isUnsetOrInteger = (value: string | undefined) =>
    value === undefined || value.trim() === '' || /^\d+$/.test(value.trim());

/**
 * Engine Configuration Guards
 * Numeric settings may be omitted, but never malformed.
 */
export const ENGINE_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'assert',
        check: env => isUnsetOrInteger(env.CIPHER_MAX_CANDIDATES),
        message: 'CIPHER_MAX_CANDIDATES must be a positive integer',
    },
    {
        type: 'assert',
        check: env => isUnsetOrInteger(env.CIPHER_CONCURRENCY),
        message: 'CIPHER_CONCURRENCY must be an integer',
    },
    {
        type: 'assert',
        check: env => isUnsetOrInteger(env.CIPHER_YIELD_EVERY),
        message: 'CIPHER_YIELD_EVERY must be a positive integer',
    },
];

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const intSetting = (schema: z.ZodNumber, fallback: number) =>
    z.preprocess(blankToUndefined, schema.default(fallback));

export const EngineConfigSchema = z.object({
    CIPHER_MAX_CANDIDATES: intSetting(z.coerce.number().int().positive(), DEFAULT_MAX_CANDIDATES),
    CIPHER_CONCURRENCY: intSetting(z.coerce.number().int().min(1).max(MAX_CONCURRENCY), DEFAULT_CONCURRENCY),
    CIPHER_YIELD_EVERY: intSetting(z.coerce.number().int().positive(), DEFAULT_YIELD_EVERY),
    LOG_LEVEL: z.preprocess(blankToUndefined, LogLevelSchema.default(DEFAULT_LOG_LEVEL)),
});

export interface EngineConfig {
    /** Ceiling on brute-force candidate keys per run */
    readonly maxCandidates: number;
    /** Cooperative trial workers */
    readonly concurrency: number;
    /** Trials a worker runs between event-loop yields */
    readonly yieldEvery: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    maxCandidates: DEFAULT_MAX_CANDIDATES,
    concurrency: DEFAULT_CONCURRENCY,
    yieldEvery: DEFAULT_YIELD_EVERY,
};

/**
 * @throws ConfigurationError when a variable is malformed or out of range
 */
export function loadEngineConfig(env: ConfigEnv = process.env): EngineConfig {
    ConfigGuard.enforce(ENGINE_CONFIG_GUARDS, env);

    const parsed = EngineConfigSchema.safeParse(env);
    if (!parsed.success) {
        const violations = parsed.error.issues.map(
            issue => `FATAL CONFIG: ${issue.path.join('.')} ${issue.message}`
        );
        logger.fatal({ errors: violations }, "Configuration Guard Violation");
        throw new ConfigurationError(violations);
    }

    return {
        maxCandidates: parsed.data.CIPHER_MAX_CANDIDATES,
        concurrency: parsed.data.CIPHER_CONCURRENCY,
        yieldEvery: parsed.data.CIPHER_YIELD_EVERY,
    };
}
