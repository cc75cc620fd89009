import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z, ZodTypeAny } from 'zod';
import { InvalidRequestError, NotFoundError, errorMessage } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';

/** Header set by App Service authentication with the caller's sign-in name. */
export const CLIENT_PRINCIPAL_HEADER = 'x-ms-client-principal-name';

export interface SenderAuthOptions {
  devMode: boolean;
  testUpn?: string;
}

export const requireSender = (options: SenderAuthOptions): RequestHandler => {
  return (req, res, next) => {
    const principal = req.header(CLIENT_PRINCIPAL_HEADER)?.trim();
    if (principal) {
      res.locals.senderUpn = principal;
      next();
      return;
    }
    if (options.devMode) {
      res.locals.senderUpn = options.testUpn ?? 'unknown';
      next();
      return;
    }
    res.status(401).json({ error: 'Authentication required' });
  };
};

export const getSenderUpn = (res: Response): string => {
  const value: unknown = res.locals.senderUpn;
  return typeof value === 'string' ? value : 'unknown';
};

export const parseBody = <S extends ZodTypeAny>(schema: S, body: unknown, message: string): z.infer<S> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new InvalidRequestError(message);
  }
  return result.data;
};

/**
 * Wraps an async route: validation errors become 400, missing entities 404
 * and anything else a 500 carrying the route's failure message.
 */
export const asyncRoute = (
  logger: Logger,
  failureMessage: string,
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, _next: NextFunction) => {
    handler(req, res).catch((error: unknown) => {
      if (error instanceof InvalidRequestError) {
        res.status(400).json({ error: error.message });
        return;
      }
      if (error instanceof NotFoundError) {
        res.status(404).json({ error: error.message });
        return;
      }
      logger.error(failureMessage, { error: errorMessage(error), path: req.path });
      res.status(500).json({ error: failureMessage });
    });
  };
};
