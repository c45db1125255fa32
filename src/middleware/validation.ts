import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z, ZodTypeAny } from 'zod';
import { ValidationError, formatZodIssues } from './errorHandler';

export interface ValidationConfig {
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

/** Rejects requests whose query string or route parameters fail their schema. */
export const createValidationMiddleware = (config: ValidationConfig): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const checks: Array<[ZodTypeAny | undefined, unknown]> = [
      [config.query, req.query],
      [config.params, req.params],
    ];

    for (const [schema, value] of checks) {
      if (!schema) {
        continue;
      }
      const result = schema.safeParse(value);
      if (!result.success) {
        next(new ValidationError('Validation failed', formatZodIssues(result.error)));
        return;
      }
    }
    next();
  };
};

/**
 * Parses the JSON body with `schema` and hands the typed result to `handler`.
 * Validation failures and handler rejections both go to the error handler.
 */
export const withValidatedBody = <S extends ZodTypeAny>(
  schema: S,
  handler: (body: z.output<S>, req: Request, res: Response) => Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(new ValidationError('Validation failed', formatZodIssues(result.error)));
      return;
    }
    handler(result.data, req, res).catch(next);
  };
};

// Common validation schemas
export const commonSchemas = {
  query: z.string()
    .trim()
    .min(1, 'Query cannot be empty')
    .max(5000, 'Query too long (max 5000 characters)'),
  sessionId: z.string().regex(/^[a-zA-Z0-9_-]{1,128}$/, 'Invalid session ID format'),
  retrievalMode: z.enum(['local', 'global', 'hybrid']),
};

export default createValidationMiddleware;
