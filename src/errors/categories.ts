import type { Capability } from '../types/common.js';
import { OpenAIError } from './error.js';

export interface ApiErrorOptions {
  apiMessage?: string;
  code?: string;
  param?: string;
  type?: string;
  requestId?: string;
}

// Raised before any network I/O.

export class ValidationError extends OpenAIError {
  constructor(message: string, options?: { param?: string; cause?: Error }) {
    super({ message, param: options?.param, cause: options?.cause });
  }
}

export class UnsupportedFeatureError extends ValidationError {
  public readonly capability: Capability;

  constructor(capability: Capability) {
    super(`Capability "${capability}" is not supported by this client`, { param: capability });
    this.capability = capability;
  }
}

// Raised after a response arrived but before it could be used.

export class MimeTypeError extends OpenAIError {
  public readonly expected: string;
  public readonly received?: string;

  constructor(expected: string, received: string | undefined, statusCode: number) {
    super({
      message: `Unexpected response content type: expected ${expected}, received ${received ?? 'none'}`,
      statusCode,
    });
    this.expected = expected;
    this.received = received;
  }
}

export class ResponseParseError extends OpenAIError {
  constructor(message: string, options: { statusCode: number; cause?: Error }) {
    super({ message, statusCode: options.statusCode, cause: options.cause });
  }
}

export class ResponseShapeError extends OpenAIError {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super({ message });
    this.issues = issues;
  }
}

export class APIConnectionError extends OpenAIError {
  constructor(message: string, options?: { cause?: Error }) {
    super({ message, cause: options?.cause });
  }
}

export class TimeoutError extends OpenAIError {
  constructor(message: string = 'Request timed out') {
    super({ message });
  }
}

// Raised for non-2xx responses.

export class InvalidRequestError extends OpenAIError {
  constructor(message: string, options?: ApiErrorOptions) {
    super({ message, statusCode: 400, ...options });
  }
}

export class AuthenticationError extends OpenAIError {
  constructor(message: string, options?: ApiErrorOptions) {
    super({ message, statusCode: 401, ...options });
  }
}

export class PermissionDeniedError extends OpenAIError {
  constructor(message: string, options?: ApiErrorOptions) {
    super({ message, statusCode: 403, ...options });
  }
}

export class NotFoundError extends OpenAIError {
  constructor(message: string, options?: ApiErrorOptions) {
    super({ message, statusCode: 404, ...options });
  }
}

export class ConflictError extends OpenAIError {
  constructor(message: string, options?: ApiErrorOptions) {
    super({ message, statusCode: 409, ...options });
  }
}

export class UnprocessableEntityError extends OpenAIError {
  constructor(message: string, options?: ApiErrorOptions) {
    super({ message, statusCode: 422, ...options });
  }
}

export class RateLimitError extends OpenAIError {
  public readonly retryAfter?: number;

  constructor(message: string, options?: ApiErrorOptions & { retryAfter?: number }) {
    super({ message, statusCode: 429, ...options });
    this.retryAfter = options?.retryAfter;
  }
}

export class InternalServerError extends OpenAIError {
  constructor(message: string, options?: ApiErrorOptions) {
    super({ message, statusCode: 500, ...options });
  }
}

export class APIError extends OpenAIError {
  constructor(message: string, statusCode: number, options?: ApiErrorOptions) {
    super({ message, statusCode, ...options });
  }
}
