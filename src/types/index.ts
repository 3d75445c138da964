export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  RequestOptions,
  ApiError,
  ApiErrorResponse,
  HttpMethod,
  HttpRequest,
} from './common.js';
export { Capability } from './common.js';
