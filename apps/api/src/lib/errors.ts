// apps/api/src/lib/errors.ts
import type { Response } from 'express';

/**
 * Failures a handler answers with a status and a short machine-readable code.
 * Anything that is not an AppError is treated as an internal error.
 */
export class AppError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message = code
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends AppError {
  constructor(code = 'invalid_payload') {
    super(400, code);
  }
}

export class UnauthorizedError extends AppError {
  constructor(code = 'unauthenticated') {
    super(401, code);
  }
}

export class ForbiddenError extends AppError {
  constructor(code = 'forbidden') {
    super(403, code);
  }
}

export class NotFoundError extends AppError {
  constructor(code = 'user_not_found') {
    super(404, code);
  }
}

export class ConflictError extends AppError {
  constructor(code = 'user_exists') {
    super(409, code);
  }
}

/**
 * Answers the request for a caught error. Unknown errors are logged under
 * `label` and reported as `server_error`, never with their own message.
 */
export function sendError(res: Response, err: unknown, label: string) {
  if (err instanceof AppError) {
    return res.status(err.status).json({ error: err.code });
  }
  console.error(`${label} error`, err);
  return res.status(500).json({ error: 'server_error' });
}
