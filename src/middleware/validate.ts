import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { RequestValidationError } from '../utils/errors';

const formatZodErrors = (error: ZodError, root: string) =>
    error.errors.map((err) => ({
        field: err.path.join('.') || root,
        message: err.message,
    }));

const parseWith = <T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, root: string): T => {
    const result = schema.safeParse(value);
    if (!result.success) {
        const errors = formatZodErrors(result.error, root);
        throw new RequestValidationError(errors.map((e) => `${e.field}: ${e.message}`).join(', '), errors);
    }
    return result.data;
};

/**
 * Parses a request body against a zod schema and returns the typed value.
 * Failures surface as RequestValidationError, rendered as a 400 by the error handler.
 *
 * @example
 * const input = validateBody(createAppointmentSchema, req.body);
 */
export const validateBody = <T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T => parseWith(schema, body, 'body');

export const validateQuery = <T>(schema: ZodType<T, ZodTypeDef, unknown>, query: unknown): T => parseWith(schema, query, 'query');
