import { request, errors, type Dispatcher } from 'undici';
import type { HttpRequest, JsonValue } from '../types/common.js';
import { OpenAIError } from '../errors/error.js';
import {
  APIConnectionError,
  MimeTypeError,
  ResponseParseError,
  TimeoutError,
} from '../errors/categories.js';
import { mapHttpError } from '../errors/mapping.js';
import { flattenJson } from '../utils/flatten.js';
import { JSON_MIME_TYPE, isMimeType, mediaType } from './mime.js';

export interface HttpTransport {
  request(request: HttpRequest): Promise<JsonValue>;
}

type ResponseHeaders = Dispatcher.ResponseData['headers'];

/**
 * Sends one request per call through undici.
 *
 * undici is used instead of `fetch` because the fine-tunes API expects a
 * JSON body on some `GET` endpoints, which `fetch` refuses to send.
 */
export class UndiciHttpTransport implements HttpTransport {
  constructor(
    private readonly baseUrl: string,
    private readonly defaultHeaders: Record<string, string> = {},
    private readonly defaultTimeout: number = 60000,
    private readonly dispatcher?: Dispatcher
  ) {}

  async request(req: HttpRequest): Promise<JsonValue> {
    const timeout = req.timeout ?? this.defaultTimeout;

    let response: Dispatcher.ResponseData;
    let text: string;
    try {
      response = await request(this.buildUrl(req.path), {
        method: req.method,
        headers: {
          'Content-Type': JSON_MIME_TYPE,
          ...this.defaultHeaders,
          ...req.headers,
        },
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        headersTimeout: timeout,
        bodyTimeout: timeout,
        signal: req.signal,
        dispatcher: this.dispatcher,
      });
      text = await response.body.text();
    } catch (error) {
      throw toTransportError(error);
    }

    const status = response.statusCode;
    const contentType = headerValue(response.headers, 'content-type');
    if (!isMimeType(contentType, JSON_MIME_TYPE)) {
      throw new MimeTypeError(JSON_MIME_TYPE, mediaType(contentType), status);
    }

    const data = flattenJson(parseJsonBody(text, status));

    if (status < 200 || status >= 300) {
      throw mapHttpError(status, data, {
        requestId: headerValue(response.headers, 'x-request-id'),
        retryAfter: headerValue(response.headers, 'retry-after'),
      });
    }

    return data;
  }

  /** Joins the base URL and the path as given; path segments are not escaped. */
  buildUrl(path: string): string {
    return `${this.baseUrl}${path}`;
  }
}

function parseJsonBody(text: string, status: number): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ResponseParseError(`Failed to parse response body as JSON (status ${status})`, {
      statusCode: status,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function toTransportError(error: unknown): OpenAIError {
  if (error instanceof OpenAIError) return error;
  if (error instanceof errors.HeadersTimeoutError || error instanceof errors.BodyTimeoutError) {
    return new TimeoutError();
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new APIConnectionError(`Connection failed: ${cause.message}`, { cause });
}
