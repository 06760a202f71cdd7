import type { TransformFailure } from '../errors/sanitizer.js';

/**
 * Vigenere variant. Fixed once per CipherEngine.
 *
 * - classic: the key repeats cyclically
 * - autokey: the key is followed by the plaintext (or recovered plaintext)
 */
export const CIPHER_MODES = ['classic', 'autokey'] as const;

export type CipherMode = typeof CIPHER_MODES[number];

export type TransformDirection = 'encrypt' | 'decrypt';

/**
 * Outcome of one CipherEngine invocation.
 * `success` means the transform ran without a validation error; it says
 * nothing about whether the output is plausible plaintext.
 */
export interface TransformResult {
    readonly text: string;
    readonly success: boolean;
    readonly error?: TransformFailure;
    /** Echo of the parameters used */
    readonly alphabet: string;
    readonly key: string;
    readonly mode: CipherMode;
    readonly direction: TransformDirection;
}

/**
 * Result of one batch trial, tagged with its enumeration index.
 */
export interface TrialResult extends TransformResult {
    readonly index: number;
}

export interface KeyIndexRange {
    /** Inclusive */
    readonly start: number;
    /** Exclusive */
    readonly end: number;
}

export interface BruteForceResultSet {
    readonly alphabet: string;
    readonly keyLength: number;
    readonly mode: CipherMode;
    /** alphabet size ^ key length */
    readonly candidateCount: number;
    readonly range: KeyIndexRange;
    readonly results: readonly TrialResult[];
    readonly successCount: number;
    /** False when the run was cancelled before every candidate in range was tried */
    readonly complete: boolean;
    readonly cancelled: boolean;
}

export interface OrchestrationTrialResult extends TrialResult {
    readonly alphabetIndex: number;
    readonly keyIndex: number;
}

export interface OrchestrationResultSet {
    readonly mode: CipherMode;
    readonly alphabetCount: number;
    readonly keyCount: number;
    /** alphabets × keys, failed pairs included */
    readonly expectedCount: number;
    readonly maxKeyLength: number;
    readonly results: readonly OrchestrationTrialResult[];
    readonly successCount: number;
    readonly failureCount: number;
    readonly complete: boolean;
    readonly cancelled: boolean;
}
