export { OpenAIError, type OpenAIErrorOptions } from './error.js';
export {
  ValidationError,
  UnsupportedFeatureError,
  MimeTypeError,
  ResponseParseError,
  ResponseShapeError,
  APIConnectionError,
  TimeoutError,
  InvalidRequestError,
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  ConflictError,
  UnprocessableEntityError,
  RateLimitError,
  InternalServerError,
  APIError,
  type ApiErrorOptions,
} from './categories.js';
export { mapHttpError, extractApiError, formatApiFailure, type ErrorResponseMeta } from './mapping.js';
