import type { RequestHandler } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Validate the request body against a schema and replace it with the parsed
 * value (defaults applied, unknown keys stripped). A ZodError is passed on to
 * the error handler.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>): RequestHandler {
  return (req, _res, next): void => {
    req.body = schema.parse(req.body);
    next();
  };
}
