import type { ApiErrorResponse } from '../types/common.js';

export function createApiError(
  message: string,
  type: string = 'invalid_request_error',
  code: string | null = null,
  param: string | null = null
): ApiErrorResponse {
  return {
    error: {
      message,
      type,
      code,
      param,
    },
  };
}

export function createNotFoundError(fineTuneId = 'ft-missing'): ApiErrorResponse {
  return createApiError(`No such fine-tune job: ${fineTuneId}`);
}

export function createUnauthorizedError(): ApiErrorResponse {
  return createApiError('Incorrect API key provided: test-sec*****.', 'invalid_request_error', 'invalid_api_key');
}

export function createRateLimitError(): ApiErrorResponse {
  return createApiError('Rate limit reached for requests', 'requests', 'rate_limit_exceeded');
}
