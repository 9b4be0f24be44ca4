import { Logger } from '@nestjs/common';
import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';

import { CompositionRoot } from '../../composition/root';
import { RequestScope } from '../../composition/scope';
import { InvalidArgumentError, NotFoundError } from '../../core/errors';

// Extend Express Request
declare module 'express-serve-static-core' {
  interface Request {
    scope?: RequestScope;
  }
}

const logger = new Logger('RequestScope');

/**
 * Creates middleware that gives every request its own scope. The scope is
 * disposed, which resolves its transaction, once the response has finished
 * or the connection closed.
 */
export function withRequestScope(root: CompositionRoot): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    let scope: RequestScope;
    try {
      scope = root.createScope();
    } catch (error) {
      next(error);
      return;
    }

    let isHandled = false;

    const cleanup = async () => {
      if (isHandled) return;
      isHandled = true;

      try {
        await scope.dispose();
      } catch (error) {
        logger.error(`Scope disposal failed for ${req.method} ${req.originalUrl}`, error instanceof Error ? error.stack : String(error));
      }
    };

    res.once('finish', cleanup);
    res.once('close', cleanup);

    req.scope = scope;
    next();
  };
}

/**
 * Gets the scope attached by {@link withRequestScope}
 */
export function requestScope(req: Request): RequestScope {
  if (!req.scope) {
    throw new Error('RequestScope not found in request');
  }
  return req.scope;
}

/**
 * Maps known errors to status codes
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({ message: 'Invalid request', issues: error.issues });
    return;
  }
  if (error instanceof InvalidArgumentError) {
    res.status(400).json({ message: error.message });
    return;
  }
  if (error instanceof NotFoundError) {
    res.status(404).json({ message: error.message });
    return;
  }

  logger.error(`Unhandled error for ${req.method} ${req.originalUrl}`, error instanceof Error ? error.stack : String(error));
  res.status(500).json({ message: 'Internal server error' });
};
