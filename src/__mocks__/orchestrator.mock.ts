import type { HttpRequest, JsonValue } from '../types/common.js';
import { decodeResponse, type RequestOrchestrator, type ResponseSchema } from '../pipeline/orchestrator.js';

/**
 * Orchestrator stand-in that records requests and replays queued results.
 */
export class RecordingOrchestrator implements RequestOrchestrator {
  readonly requests: HttpRequest[] = [];
  private readonly results: Array<JsonValue | Error> = [];

  respondWith(data: JsonValue): this {
    this.results.push(data);
    return this;
  }

  failWith(error: Error): this {
    this.results.push(error);
    return this;
  }

  lastRequest(): HttpRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  async request<T>(request: HttpRequest, schema: ResponseSchema<T>): Promise<T> {
    this.requests.push(request);
    const next = this.results.shift() ?? {};
    if (next instanceof Error) {
      throw next;
    }
    return decodeResponse(request, next, schema);
  }
}
