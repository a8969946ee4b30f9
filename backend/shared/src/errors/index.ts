/**
 * Error types shared by every marketplace service.
 *
 * Operational errors carry a message that is safe to put on the wire as-is.
 * Anything else (transport failures, programming errors) is collapsed by the
 * gateways into an operation-specific fallback message.
 */

import { ErrorFrame } from '../protocol/types';

export enum ErrorCode {
  // Sessions
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SESSION_EXPIRED = 'SESSION_EXPIRED',
  INVALID_SESSION_TYPE = 'INVALID_SESSION_TYPE',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',

  // Protocol
  INVALID_REQUEST = 'INVALID_REQUEST',

  // Domain
  NOT_FOUND = 'NOT_FOUND',
  FORBIDDEN = 'FORBIDDEN',
  INSUFFICIENT_QUANTITY = 'INSUFFICIENT_QUANTITY',
  REMOTE_ERROR = 'REMOTE_ERROR',

  // Transport
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  UNEXPECTED_RESPONSE = 'UNEXPECTED_RESPONSE',

  // System
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class BaseError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    context: Record<string, unknown> = {},
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toErrorFrame(): ErrorFrame {
    return { type: 'Error', message: this.message };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Malformed or undecodable frame
 */
export class ValidationError extends BaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.INVALID_REQUEST, context);
  }
}

export class AuthenticationError extends BaseError {
  constructor(message: string, code: ErrorCode, context: Record<string, unknown> = {}) {
    super(message, code, context);
  }

  static sessionNotFound(): AuthenticationError {
    return new AuthenticationError('Session not found', ErrorCode.SESSION_NOT_FOUND);
  }

  static sessionExpired(): AuthenticationError {
    return new AuthenticationError('Session expired', ErrorCode.SESSION_EXPIRED);
  }

  static invalidSessionType(): AuthenticationError {
    return new AuthenticationError('Invalid session type', ErrorCode.INVALID_SESSION_TYPE);
  }

  static invalidPassword(): AuthenticationError {
    return new AuthenticationError('Invalid password', ErrorCode.INVALID_CREDENTIALS);
  }
}

export class NotFoundError extends BaseError {
  public readonly resource: string;

  constructor(resource: string, context: Record<string, unknown> = {}) {
    super(`${resource} not found`, ErrorCode.NOT_FOUND, { resource, ...context });
    this.resource = resource;
  }
}

export class ForbiddenError extends BaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.FORBIDDEN, context);
  }

  static notOwner(itemId: string): ForbiddenError {
    return new ForbiddenError('Not your item', { itemId });
  }
}

export class InsufficientQuantityError extends BaseError {
  constructor(requested: number, available: number) {
    super('Insufficient quantity', ErrorCode.INSUFFICIENT_QUANTITY, { requested, available });
  }
}

/**
 * A downstream service answered with its own Error frame. The message is
 * propagated unchanged.
 */
export class RemoteError extends BaseError {
  public readonly serviceName: string;

  constructor(serviceName: string, message: string) {
    super(message, ErrorCode.REMOTE_ERROR, { serviceName });
    this.serviceName = serviceName;
  }
}

/**
 * Connect failure, premature close, undecodable or unexpected response.
 */
export class ServiceClientError extends BaseError {
  public readonly serviceName: string;

  constructor(
    message: string,
    serviceName: string,
    code: ErrorCode = ErrorCode.SERVICE_UNAVAILABLE,
    public readonly originalError?: Error
  ) {
    super(message, code, { serviceName }, false);
    this.serviceName = serviceName;
  }

  static unexpectedResponse(serviceName: string, expected: string, received: string): ServiceClientError {
    return new ServiceClientError(
      `Expected ${expected} from ${serviceName}, received ${received}`,
      serviceName,
      ErrorCode.UNEXPECTED_RESPONSE
    );
  }
}

export class ConfigurationError extends BaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, false);
  }
}

export function isOperationalError(error: unknown): error is BaseError {
  return error instanceof BaseError && error.isOperational;
}

/**
 * Re-express a failure as an Error frame. Operational errors keep their
 * message; everything else becomes `fallback`.
 */
export function toErrorFrame(error: unknown, fallback: string): ErrorFrame {
  if (isOperationalError(error)) {
    return error.toErrorFrame();
  }
  return { type: 'Error', message: fallback };
}

/**
 * Await a downstream step, replacing a non-operational failure with an
 * operational one carrying `fallback`.
 */
export async function withFallback<T>(pending: Promise<T>, fallback: string): Promise<T> {
  try {
    return await pending;
  } catch (error) {
    if (isOperationalError(error)) {
      throw error;
    }
    throw new BaseError(fallback, ErrorCode.SERVICE_UNAVAILABLE, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
