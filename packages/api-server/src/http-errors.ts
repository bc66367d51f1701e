import type { ErrorRequestHandler, Response } from 'express';
import type { ZodError } from 'zod';
import {
  DuplicateResourceError,
  NotFoundError,
  InvalidCredentialsError,
  type BlogError,
} from '@blog-api/core';

export interface ErrorBody {
  readonly error: string;
  readonly message: string;
}

const INTERNAL_ERROR_BODY: ErrorBody = {
  error: 'Internal Server Error',
  message: 'Internal server error',
};

/**
 * Map a domain error to its response. Store and hash faults are logged with
 * the route label and never echoed to the client.
 */
export function sendError(res: Response, error: BlogError, route: string): void {
  if (error instanceof InvalidCredentialsError) {
    res.setHeader('WWW-Authenticate', error.challenge);
    res.status(401).json({ error: 'Unauthorized', message: error.message } satisfies ErrorBody);
    return;
  }
  if (error instanceof NotFoundError) {
    res.status(404).json({ error: 'Not Found', message: error.message } satisfies ErrorBody);
    return;
  }
  if (error instanceof DuplicateResourceError) {
    res.status(400).json({ error: 'Bad Request', message: error.message } satisfies ErrorBody);
    return;
  }

  // eslint-disable-next-line no-console
  console.error(`[api-server] ${route} failed: ${error.name}: ${error.message}`);
  res.status(500).json(INTERNAL_ERROR_BODY);
}

export function sendValidationError(res: Response, error: ZodError): void {
  res.status(422).json({
    error: 'Validation Error',
    details: error.issues,
  });
}

/** Last handler in the chain: anything thrown becomes a logged 500. */
export function createErrorHandler(): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    // body-parser rejects malformed JSON with a 400-class status
    if (hasClientStatus(error)) {
      res.status(error.status).json({ error: 'Bad Request', message: error.message } satisfies ErrorBody);
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    // eslint-disable-next-line no-console
    console.error(`[api-server] ${req.method} ${req.path} failed: ${message}`);
    res.status(500).json(INTERNAL_ERROR_BODY);
  };
}

function hasClientStatus(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}
