import type { NextFunction } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';

type Middleware<K extends string> = (
  req: Record<K, unknown>,
  _res: unknown,
  next: NextFunction
) => void;

/**
 * Parse `req.body` with a schema, replacing it with the parsed value.
 * A ZodError is thrown for the error handler to render as 400.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>): Middleware<'body'> {
  return (req, _res, next) => {
    req.body = schema.parse(req.body);
    next();
  };
}

export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>): Middleware<'query'> {
  return (req, _res, next) => {
    req.query = schema.parse(req.query);
    next();
  };
}

export function validateParams<T>(schema: ZodType<T, ZodTypeDef, unknown>): Middleware<'params'> {
  return (req, _res, next) => {
    req.params = schema.parse(req.params);
    next();
  };
}
