/**
 * Shared request parsing and error responses for the estimator routes
 */

import { Request, Response } from 'express';
import { z, ZodError } from 'zod';
import { isEstimatorError, ValidationError } from '../errors';

export interface ErrorResponse {
  success: false;
  error: string;
  error_code: string;
  field?: string;
  retriable: boolean;
  timestamp: string;
}

export interface ErrorReply {
  status: number;
  body: ErrorResponse;
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

function describeZodError(error: ZodError): { message: string; field?: string } {
  const [issue] = error.issues;
  if (!issue) return { message: 'Invalid request' };
  const field = issue.path.join('.');
  return {
    message: field ? `${field}: ${issue.message}` : issue.message,
    field: field || undefined
  };
}

export function toErrorReply(error: unknown): ErrorReply {
  const timestamp = new Date().toISOString();

  if (error instanceof ZodError) {
    const { message, field } = describeZodError(error);
    return {
      status: 400,
      body: { success: false, error: message, error_code: 'INVALID_REQUEST', field, retriable: false, timestamp }
    };
  }

  if (isEstimatorError(error)) {
    return {
      status: error.status,
      body: {
        success: false,
        error: error.message,
        error_code: error.code,
        field: error instanceof ValidationError ? error.field : undefined,
        retriable: error.retriable,
        timestamp
      }
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error occurred',
      error_code: 'INTERNAL_ERROR',
      retriable: false,
      timestamp
    }
  };
}

type RouteHandler = (req: Request, res: Response, signal: AbortSignal) => Promise<void>;

/**
 * Wraps an async handler: the signal aborts when the client goes away, and
 * any thrown error becomes the standard error body.
 */
export function route(label: string, handler: RouteHandler) {
  return async (req: Request, res: Response): Promise<void> => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      await handler(req, res, controller.signal);
    } catch (error) {
      const reply = toErrorReply(error);
      if (reply.status >= 500) {
        console.error(`❌ ${label} error:`, error);
      } else {
        console.warn(`⚠️ ${label} rejected: ${reply.body.error_code} ${reply.body.error}`);
      }
      if (!res.headersSent) {
        res.status(reply.status).json(reply.body);
      }
    }
  };
}
