import { Alphabet } from '../cipher/alphabet.js';
import { EmptyInputError, InputValidationError } from '../errors/cipherErrors.js';

export interface NormalizeOptions {
    /** Upper-case and drop all whitespace instead of trimming */
    readonly removeSpaces?: boolean;
}

/**
 * Caller-side normalization. The engine itself never changes case.
 */
export function normalizeText(text: string, options: NormalizeOptions = {}): string {
    if (options.removeSpaces) {
        return text.toUpperCase().replace(/\s+/g, '');
    }
    return text.trim();
}

export interface TextLimits {
    /** Maximum length in characters (code points) */
    readonly maxLength?: number;
}

/**
 * @throws EmptyInputError when text is empty
 * @throws InputValidationError when text is longer than maxLength
 */
export function validateInput(text: string, limits: TextLimits = {}, context = 'text'): string {
    if (text.length === 0) {
        throw new EmptyInputError();
    }

    const { maxLength } = limits;
    if (maxLength !== undefined && Array.from(text).length > maxLength) {
        throw new InputValidationError(context, [
            { path: context, message: `Text exceeds maximum length of ${maxLength} characters` }
        ]);
    }
    return text;
}

/**
 * Upper-cases, then keeps only alphabet members and the whitespace between them.
 */
export function prepareText(text: string, alphabet: Alphabet): string {
    return alphabet.filterText(text.toUpperCase(), { preserveSpaces: true });
}
