import type { ZodType, ZodTypeDef } from 'zod';
import type { HttpTransport } from '../transport/http-transport.js';
import type { HttpRequest, JsonValue } from '../types/common.js';
import { ResponseShapeError } from '../errors/categories.js';
import type { RequestHook, ResponseHook, ErrorHook, PipelineHooks } from './hooks.js';

export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface RequestOrchestrator {
  request<T>(request: HttpRequest, schema: ResponseSchema<T>): Promise<T>;
}

/**
 * Runs a request through the transport exactly once, wrapped in hooks.
 * Nothing is retried; every failure propagates to the caller.
 */
export class DefaultRequestOrchestrator implements RequestOrchestrator {
  private readonly hooks: {
    request: RequestHook[];
    response: ResponseHook[];
    error: ErrorHook[];
  } = { request: [], response: [], error: [] };

  constructor(private readonly transport: HttpTransport) {}

  addRequestHook(hook: RequestHook): this {
    this.hooks.request.push(hook);
    return this;
  }

  addResponseHook(hook: ResponseHook): this {
    this.hooks.response.push(hook);
    return this;
  }

  addErrorHook(hook: ErrorHook): this {
    this.hooks.error.push(hook);
    return this;
  }

  use(hooks: PipelineHooks): this {
    if (hooks.onRequest) this.addRequestHook(hooks.onRequest);
    if (hooks.onResponse) this.addResponseHook(hooks.onResponse);
    if (hooks.onError) this.addErrorHook(hooks.onError);
    return this;
  }

  async request<T>(request: HttpRequest, schema: ResponseSchema<T>): Promise<T> {
    const startTime = Date.now();

    try {
      for (const hook of this.hooks.request) {
        await hook(request);
      }

      const data = await this.transport.request(request);
      const result = decodeResponse(request, data, schema);

      const duration = Date.now() - startTime;
      for (const hook of this.hooks.response) {
        await hook(request, duration);
      }

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      const failure = error instanceof Error ? error : new Error(String(error));
      for (const hook of this.hooks.error) {
        await hook(request, failure, duration);
      }
      throw error;
    }
  }
}

export function decodeResponse<T>(request: HttpRequest, data: JsonValue, schema: ResponseSchema<T>): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ResponseShapeError(
      `Unexpected response shape from ${request.method} ${request.path}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
