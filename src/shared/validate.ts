import { Request, Response, NextFunction } from 'express';
import { ZodTypeAny } from 'zod';
import { ResponseHandler } from './responses/responses';

type RequestSource = 'body' | 'params' | 'query';

const validate = (schema: ZodTypeAny, source: RequestSource = 'body') => {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const firstIssueMessage = result.error.issues[0]?.message || 'Invalid request data';
      return ResponseHandler.validationError(res, result.error.issues, firstIssueMessage);
    }

    req[source] = result.data;
    next();
  };
};

export default validate
