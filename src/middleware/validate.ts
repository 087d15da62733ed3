import { Request, Response, NextFunction } from 'express';
import { ZodSchema, ZodError, ZodIssue } from 'zod';

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((e: ZodIssue) => `${e.path.join('.')}: ${e.message}`);
}

/**
 * Validates the body and replaces it with the parsed value, so schema defaults apply
 */
export function validate(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          error: 'Validation failed',
          details: formatZodIssues(error)
        });
        return;
      }
      next(error);
    }
  };
}

export function validateParams(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      schema.parse(req.params);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          error: 'Invalid parameters',
          details: error.issues.map((e: ZodIssue) => e.message)
        });
        return;
      }
      next(error);
    }
  };
}
