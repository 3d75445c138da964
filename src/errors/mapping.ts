import { z } from 'zod';
import type { ApiError, JsonValue } from '../types/common.js';
import type { OpenAIError } from './error.js';
import {
  AuthenticationError,
  RateLimitError,
  InvalidRequestError,
  NotFoundError,
  PermissionDeniedError,
  ConflictError,
  UnprocessableEntityError,
  APIError,
  InternalServerError,
  type ApiErrorOptions,
} from './categories.js';

export interface ErrorResponseMeta {
  requestId?: string;
  retryAfter?: string;
}

// Each field decodes on its own so a mistyped sibling never hides the message.
const apiErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional().catch(undefined),
    type: z.string().nullish().catch(undefined),
    param: z.string().nullish().catch(undefined),
    code: z.string().nullish().catch(undefined),
  }),
});

export function formatApiFailure(status: number, apiMessage: string): string {
  return `OpenAI API request failed [${status}]: ${apiMessage}`;
}

export function extractApiError(body: JsonValue): ApiError {
  const parsed = apiErrorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.error : {};
}

export function mapHttpError(
  status: number,
  body: JsonValue,
  meta: ErrorResponseMeta = {}
): OpenAIError {
  const apiError = extractApiError(body);
  const apiMessage = apiError.message ?? `HTTP ${status} error`;
  const message = formatApiFailure(status, apiMessage);
  const options: ApiErrorOptions = {
    apiMessage: apiError.message,
    code: apiError.code ?? undefined,
    param: apiError.param ?? undefined,
    type: apiError.type ?? undefined,
    requestId: meta.requestId,
  };

  switch (status) {
    case 400: return new InvalidRequestError(message, options);
    case 401: return new AuthenticationError(message, options);
    case 403: return new PermissionDeniedError(message, options);
    case 404: return new NotFoundError(message, options);
    case 409: return new ConflictError(message, options);
    case 422: return new UnprocessableEntityError(message, options);
    case 429: return new RateLimitError(message, { ...options, retryAfter: parseRetryAfter(meta.retryAfter) });
    case 500: return new InternalServerError(message, options);
    default: return new APIError(message, status, options);
  }
}

function parseRetryAfter(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = parseInt(value, 10);
  return isNaN(seconds) ? undefined : seconds;
}
