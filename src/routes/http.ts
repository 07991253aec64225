import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';

import { AppError, describeError } from '../errors';

export const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

export const formatIssues = (error: ZodError): Array<{ path?: string; message: string }> =>
  error.issues.map((issue) => ({
    path: issue.path.join('.') || undefined,
    message: issue.message,
  }));

export const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  if (error instanceof ZodError) {
    res.status(400).json({ errors: formatIssues(error) });
    return;
  }

  if (error instanceof multer.MulterError) {
    res.status(400).json({ error: { code: 'invalid_upload', message: error.message } });
    return;
  }

  if (error instanceof AppError) {
    if (error.status >= 500) {
      console.error(`${error.name}: ${error.message}`);
    }
    res.status(error.status).json({ error: { code: error.code, message: error.message } });
    return;
  }

  console.error(`Unhandled request error: ${describeError(error)}`);
  res.status(500).json({ error: { code: 'internal_error', message: 'Internal server error' } });
};
