import { Request, Response, NextFunction } from 'express';
import { ZodType, ZodTypeDef } from 'zod';
import { ApiError } from '../utils/ApiError';

/**
 * Validates `{ body, query, params }` against the schema. Parsed body values
 * replace the raw ones so handlers see trimmed/normalized input.
 */
export const validate = (schema: ZodType<{ body?: unknown }, ZodTypeDef, unknown>) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });
    if (!result.success) {
      const errorMessage =
        result.error.issues.map((issue) => issue.message).join(', ') || 'Validation failed';
      throw ApiError.badRequest(errorMessage);
    }
    if (result.data.body !== undefined) {
      req.body = result.data.body;
    }
    next();
  };
};
