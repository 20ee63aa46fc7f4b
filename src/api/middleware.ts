/**
 * API middleware: request-body validation helpers and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { AppError, apiError, internalError, TypedError, validationError } from '../domain/errors';
import { isRecord } from '../documents/wire';
import { logger } from '../logger';

/** Read the JSON body as an object, rejecting anything else with a validation error. */
export function requireObjectBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) {
    throw new AppError(validationError('Request body must be a JSON object'));
  }
  return body;
}

/** Send any thrown value as a typed error response. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof AppError) {
    const status = getHttpStatus(err.typedError);
    if (status >= 500) {
      logger.error('Request failed', { code: err.code, status, message: err.message });
    } else {
      logger.warn('Request error', { code: err.code, status });
    }
    res.status(status).json(apiError(err.typedError));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(internalError(message)));
}

/** Body-parser failures carry an HTTP status of their own. */
function clientStatusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = clientStatusOf(err);
  if (status !== undefined && !(err instanceof AppError)) {
    const message = err instanceof Error ? err.message : 'Malformed request';
    logger.warn('Malformed request', { status, message });
    res.status(status).json(apiError(validationError(message)));
    return;
  }
  sendError(res, err);
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'WORKFLOW.NOT_READY') return 409;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'DOCUMENT_API.TRANSPORT') return 502;
  if (error.code === 'DOCUMENT_API.POLL_TIMEOUT') return 504;
  if (error.code.startsWith('DOCUMENT_API.')) return 422;
  return 500;
}
