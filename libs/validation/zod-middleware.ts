import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ProvisioningError } from '../errors/sanitizer.js';

/**
 * Validation helper.
 * Returns the parsed value or throws a ValidationError carrying every issue.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new ProvisioningError(
            'ValidationError',
            errorDetails.map(d => d.message).join('; '),
            { context, errors: errorDetails },
            { step: 'Validate' }
        );
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
