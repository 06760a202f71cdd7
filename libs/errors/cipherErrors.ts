/**
 * Cipher Error Taxonomy
 *
 * Construction-time errors (Alphabet, Key, single transforms) are thrown to
 * the immediate caller. Batch runners catch them per trial and record them
 * as TransformFailure entries instead.
 */

export type CipherErrorCode =
    | 'INVALID_ALPHABET'
    | 'INVALID_KEY'
    | 'EMPTY_INPUT'
    | 'COMBINATORIAL_LIMIT_EXCEEDED'
    | 'INVALID_INPUT'
    | 'CONFIGURATION_ERROR';

export abstract class CipherError extends Error {
    abstract readonly code: CipherErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type InvalidAlphabetReason = 'empty' | 'too_short' | 'duplicate' | 'multi_character';

export class InvalidAlphabetError extends CipherError {
    readonly code = 'INVALID_ALPHABET';

    constructor(
        public readonly reason: InvalidAlphabetReason,
        public readonly symbol?: string
    ) {
        super(describeAlphabetReason(reason, symbol));
    }
}

function describeAlphabetReason(reason: InvalidAlphabetReason, symbol: string | undefined): string {
    switch (reason) {
        case 'empty':
            return 'Alphabet cannot be empty';
        case 'too_short':
            return 'Alphabet must contain at least 2 symbols';
        case 'duplicate':
            return `Alphabet must contain unique symbols (duplicate "${symbol ?? ''}")`;
        case 'multi_character':
            return `Alphabet symbols must be single characters (got "${symbol ?? ''}")`;
    }
}

export type InvalidKeyReason = 'empty' | 'foreign_symbol';

export class InvalidKeyError extends CipherError {
    readonly code = 'INVALID_KEY';

    constructor(
        public readonly reason: InvalidKeyReason,
        public readonly symbol?: string,
        public readonly position?: number
    ) {
        super(
            reason === 'empty'
                ? 'Key cannot be empty'
                : `Key symbol "${symbol ?? ''}" at position ${position ?? -1} is not in the alphabet`
        );
    }
}

export class EmptyInputError extends CipherError {
    readonly code = 'EMPTY_INPUT';

    constructor(what = 'Text') {
        super(`${what} cannot be empty`);
    }
}

export class CombinatorialLimitExceededError extends CipherError {
    readonly code = 'COMBINATORIAL_LIMIT_EXCEEDED';

    constructor(
        public readonly candidateCount: bigint,
        public readonly limit: number
    ) {
        super(`Search space of ${candidateCount} candidate keys exceeds the limit of ${limit}`);
    }
}

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class InputValidationError extends CipherError {
    readonly code = 'INVALID_INPUT';

    constructor(
        public readonly context: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
    }
}

export class ConfigurationError extends CipherError {
    readonly code = 'CONFIGURATION_ERROR';

    constructor(public readonly violations: readonly string[]) {
        super(`Configuration guard violation: ${violations.join('; ')}`);
    }
}
