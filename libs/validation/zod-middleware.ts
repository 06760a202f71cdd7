import { z, ZodTypeAny } from 'zod';
import { logger } from '../logging/logger.js';
import { InputValidationError } from '../errors/cipherErrors.js';

/**
 * Boundary validation for raw caller input.
 * Throws InputValidationError so invalid input never reaches the transform logic.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new InputValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for creating reusable request validators.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
