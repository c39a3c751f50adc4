/**
 * Maps thrown errors to HTTP responses:
 * validation -> 422, missing task -> 404, everything else -> 500.
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ZodError } from 'zod';
import {
  RequestValidationError,
  TaskNotFoundError,
  toValidationDetails,
  type ErrorResponse,
} from '../errors.js';
import * as out from '../output.js';

/** body-parser marks unparseable JSON with this type */
function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Client errors raised by body-parser (413 too large, 415 bad charset, ...) */
function clientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  let status: number;
  let body: ErrorResponse;

  if (err instanceof RequestValidationError) {
    status = 422;
    body = { detail: toValidationDetails(err.location, err.issues) };
  } else if (err instanceof ZodError) {
    status = 422;
    body = { detail: toValidationDetails('body', err.issues) };
  } else if (isJsonParseError(err)) {
    status = 422;
    body = { detail: [{ loc: ['body'], msg: 'JSON decode error', type: 'json_invalid' }] };
  } else if (err instanceof TaskNotFoundError) {
    status = 404;
    body = { detail: err.message };
  } else {
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null && err instanceof Error) {
      status = clientStatus;
      body = { detail: err.message };
    } else {
      out.error(`${req.method} ${req.originalUrl} failed`, err);
      status = 500;
      body = { detail: 'Internal Server Error' };
    }
  }

  res.status(status).json(body);
};

export const notFoundHandler: RequestHandler = (_req, res) => {
  const body: ErrorResponse = { detail: 'Not Found' };
  res.status(404).json(body);
};

/** Answer 405 with an Allow header for known paths hit with the wrong method */
export function methodNotAllowed(...allowed: string[]): RequestHandler {
  return (_req, res) => {
    const body: ErrorResponse = { detail: 'Method Not Allowed' };
    res.set('Allow', allowed.join(', ')).status(405).json(body);
  };
}
