export type { FineTunesClient, FineTunesClientConfig, NormalizedConfig } from './client/index.js';
export { FineTunesClientImpl, createClient, createClientFromEnv, configFromEnv } from './client/index.js';

export type { RequestOptions, JsonValue, JsonObject, HttpRequest } from './types/index.js';
export { Capability } from './types/index.js';

export {
  OpenAIError,
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
} from './errors/index.js';

export type { HttpTransport } from './transport/index.js';
export { UndiciHttpTransport } from './transport/index.js';

export type { AuthManager } from './auth/index.js';
export { createAuthManager } from './auth/index.js';

export type { RequestOrchestrator, RequestHook, ResponseHook, ErrorHook } from './pipeline/index.js';
export { DefaultRequestOrchestrator, LoggingHooks } from './pipeline/index.js';

export type { Logger, LogLevel } from './observability/index.js';
export { ConsoleLogger, NoopLogger, createLogger } from './observability/index.js';

export { flattenJson } from './utils/flatten.js';

export type {
  FineTunesService,
  FineTune,
  FineTuneList,
  FineTuneEvent,
  FineTuneEventList,
  FineTuneEventListParams,
  FineTuneCreateRequest,
  ModelDeleteResponse,
} from './services/fine-tunes/index.js';
export { FineTunesServiceImpl } from './services/fine-tunes/index.js';
