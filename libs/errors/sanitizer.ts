import { CipherError, CipherErrorCode } from './cipherErrors.js';

/**
 * Failure record stored in place of output when a trial cannot run.
 */
export interface TransformFailure {
    readonly code: CipherErrorCode | 'INTERNAL_ERROR';
    readonly message: string;
}

const MAX_MESSAGE_LENGTH = 500;

/**
 * Turns any thrown value into a TransformFailure.
 * Known cipher errors keep their code; anything else is INTERNAL_ERROR.
 */
export function describeFailure(err: unknown): TransformFailure {
    if (err instanceof CipherError) {
        return { code: err.code, message: err.message };
    }

    let message: string;
    if (err instanceof Error) {
        message = err.message;
    } else if (typeof err === 'string') {
        message = err;
    } else if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
        message = err.message;
    } else {
        message = String(err);
    }

    return {
        code: 'INTERNAL_ERROR',
        message: message.substring(0, MAX_MESSAGE_LENGTH)
    };
}
