import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '../middleware/logging';

/**
 * Custom HTTP error class with status code and optional details
 */
export class HttpError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unauthorized error (401)
 */
export class UnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized', details?: unknown) {
    super(401, message, details);
    this.name = 'Unauthorized';
  }
}

/**
 * Unknown function error (404)
 * Thrown when a call names a function that is not in the registry
 */
export class UnknownFunctionError extends HttpError {
  functionName: string;

  constructor(functionName: string) {
    super(404, `Unknown function: ${functionName}`, { function: functionName });
    this.name = 'UnknownFunction';
    this.functionName = functionName;
  }
}

/**
 * Missing parameter error (400)
 * Carries the first required parameter that was absent from the call
 */
export class MissingParameterError extends HttpError {
  parameter: string;

  constructor(functionName: string, parameter: string) {
    super(400, `Missing required parameter '${parameter}' for ${functionName}`, {
      function: functionName,
      parameter,
    });
    this.name = 'MissingParameter';
    this.parameter = parameter;
  }
}

/**
 * Invalid parameter error (400)
 * Thrown when parameters are present but fail schema validation
 */
export class InvalidParameterError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = 'InvalidParameter';
  }
}

/**
 * Provider rejected error (502)
 * Namecheap answered with Status="ERROR"; code and message are passed through verbatim
 */
export class ProviderRejectedError extends HttpError {
  code: string;
  command: string;

  constructor(command: string, code: string, message: string) {
    super(502, message, { command, code });
    this.name = 'ProviderRejected';
    this.code = code;
    this.command = command;
  }
}

/**
 * Transport failure error (502, or 504 on timeout)
 * The HTTP exchange with Namecheap could not be completed or its body could not be read
 */
export class TransportFailureError extends HttpError {
  reason: 'network' | 'timeout' | 'http_status' | 'malformed_response';
  command: string;

  constructor(
    command: string,
    reason: TransportFailureError['reason'],
    message: string,
    details?: Record<string, unknown>
  ) {
    super(reason === 'timeout' ? 504 : 502, message, { command, reason, ...details });
    this.name = 'TransportFailure';
    this.reason = reason;
    this.command = command;
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  status: number;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Convert any thrown value into the structured error payload
 */
export function toErrorResponse(err: unknown, exposeMessage = true): ErrorResponse {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    return {
      error: 'ValidationError',
      message: 'Request validation failed',
      details: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
        code: e.code,
      })),
      status: 400,
    };
  }

  // Handle custom HTTP errors
  if (err instanceof HttpError) {
    return {
      error: err.name,
      message: err.message,
      details: err.details,
      status: err.status,
    };
  }

  // Malformed JSON rejected by express.json()
  if (isBodyParseError(err)) {
    return {
      error: 'ValidationError',
      message: 'Request body is not valid JSON',
      status: 400,
    };
  }

  // Handle unknown errors
  return {
    error: 'InternalError',
    message: exposeMessage && err instanceof Error ? err.message : 'An unexpected error occurred',
    status: 500,
  };
}

/**
 * Global error handler middleware
 * Catches all errors and formats them consistently.
 * Outside production, messages of unexpected errors are returned and stacks logged.
 */
export function createErrorHandler(nodeEnv: string) {
  const exposeMessages = nodeEnv !== 'production';

  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const log = getLogger(req);
    const response = toErrorResponse(err, exposeMessages);

    // Log error with structured logging
    const errorContext: Record<string, unknown> = {
      event: 'error',
      errorName: err.name,
      errorMessage: err.message,
      path: req.path,
      method: req.method,
      status: response.status,
      details: response.details,
    };

    if (nodeEnv === 'development') {
      errorContext.stack = err.stack;
    }

    if (response.status >= 500) {
      log.error(errorContext);
    } else {
      log.warn(errorContext);
    }

    res.status(response.status).json(response);
  };
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: 'NotFoundError',
    message: 'The requested endpoint does not exist',
    status: 404,
  };

  res.status(404).json(response);
}

/**
 * Async route wrapper to catch errors
 * Eliminates need for try-catch in every route
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
