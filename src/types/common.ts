export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

export interface RequestOptions {
  timeout?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface ApiError {
  message?: string;
  type?: string | null;
  param?: string | null;
  code?: string | null;
}

export interface ApiErrorResponse {
  error: ApiError;
}

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  headers?: Record<string, string>;
  body?: unknown;
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Features the upstream API exposes but this client declines to implement.
 * Asking for one raises an `UnsupportedFeatureError` before any I/O.
 */
export const Capability = {
  Streaming: 'stream',
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];
