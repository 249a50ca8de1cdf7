import { ZodSchema } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError, ValidationErrorCode } from '../errors/ledgerErrors.js';

/**
 * Parses `data` against `schema` and throws a ValidationError on failure.
 * Used at every operation boundary before any state is touched.
 */
export function validate<T>(
    schema: ZodSchema<T>,
    data: unknown,
    context: string,
    code: ValidationErrorCode = 'INVALID_INPUT'
): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: errorDetails }, "Input validation failure");

        throw new ValidationError(code, `Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}
