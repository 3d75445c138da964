import type { HttpRequest } from '../types/common.js';
import type { Logger } from '../observability/logging.js';

export type RequestHook = (request: HttpRequest) => void | Promise<void>;
export type ResponseHook = (request: HttpRequest, durationMs: number) => void | Promise<void>;
export type ErrorHook = (request: HttpRequest, error: Error, durationMs: number) => void | Promise<void>;

export interface PipelineHooks {
  onRequest?: RequestHook;
  onResponse?: ResponseHook;
  onError?: ErrorHook;
}

export class LoggingHooks implements PipelineHooks {
  constructor(private readonly logger: Logger) {}

  onRequest: RequestHook = (request) => {
    this.logger.debug(`[OpenAI] ${request.method} ${request.path}`);
  };

  onResponse: ResponseHook = (request, durationMs) => {
    this.logger.debug(`[OpenAI] ${request.method} ${request.path} completed in ${durationMs}ms`);
  };

  // Failures reach the caller as thrown errors; this only leaves a trace.
  onError: ErrorHook = (request, error, durationMs) => {
    this.logger.debug(`[OpenAI] ${request.method} ${request.path} failed after ${durationMs}ms`, {
      errorType: error.name,
      message: error.message,
    });
  };
}
