import type { RequestOrchestrator } from '../../pipeline/orchestrator.js';
import type { RequestOptions } from '../../types/common.js';
import {
  fineTuneEventListSchema,
  fineTuneListSchema,
  fineTuneSchema,
  modelDeleteResponseSchema,
  type FineTune,
  type FineTuneCreateRequest,
  type FineTuneEventList,
  type FineTuneEventListParams,
  type FineTuneList,
  type ModelDeleteResponse,
} from './types.js';
import { FineTunesValidator } from './validation.js';

export interface FineTunesService {
  create(request: FineTuneCreateRequest, options?: RequestOptions): Promise<FineTune>;
  list(options?: RequestOptions): Promise<FineTuneList>;
  retrieve(fineTuneId: string, options?: RequestOptions): Promise<FineTune>;
  cancel(fineTuneId: string, options?: RequestOptions): Promise<FineTune>;
  /**
   * Lists the status events of a fine-tune job.
   *
   * Sends `GET /v1/fine-tunes/{fineTuneId}/events` with the body
   * `{"stream": false}`. The id is placed in the path as given.
   */
  listEvents(
    fineTuneId: string,
    params?: FineTuneEventListParams,
    options?: RequestOptions
  ): Promise<FineTuneEventList>;
  deleteModel(model: string, options?: RequestOptions): Promise<ModelDeleteResponse>;
}

export class FineTunesServiceImpl implements FineTunesService {
  constructor(private readonly orchestrator: RequestOrchestrator) {}

  async create(request: FineTuneCreateRequest, options?: RequestOptions): Promise<FineTune> {
    const body = FineTunesValidator.validateCreate(request);

    return this.orchestrator.request(
      {
        method: 'POST',
        path: '/v1/fine-tunes',
        body,
        ...options,
      },
      fineTuneSchema
    );
  }

  async list(options?: RequestOptions): Promise<FineTuneList> {
    return this.orchestrator.request(
      {
        method: 'GET',
        path: '/v1/fine-tunes',
        ...options,
      },
      fineTuneListSchema
    );
  }

  async retrieve(fineTuneId: string, options?: RequestOptions): Promise<FineTune> {
    const id = FineTunesValidator.validateFineTuneId(fineTuneId);

    return this.orchestrator.request(
      {
        method: 'GET',
        path: `/v1/fine-tunes/${id}`,
        ...options,
      },
      fineTuneSchema
    );
  }

  async cancel(fineTuneId: string, options?: RequestOptions): Promise<FineTune> {
    const id = FineTunesValidator.validateFineTuneId(fineTuneId);

    return this.orchestrator.request(
      {
        method: 'POST',
        path: `/v1/fine-tunes/${id}/cancel`,
        ...options,
      },
      fineTuneSchema
    );
  }

  async listEvents(
    fineTuneId: string,
    params: FineTuneEventListParams = {},
    options?: RequestOptions
  ): Promise<FineTuneEventList> {
    const id = FineTunesValidator.validateFineTuneId(fineTuneId);
    const stream = FineTunesValidator.validateStream(params.stream ?? false);

    return this.orchestrator.request(
      {
        method: 'GET',
        path: `/v1/fine-tunes/${id}/events`,
        body: { stream },
        ...options,
      },
      fineTuneEventListSchema
    );
  }

  async deleteModel(model: string, options?: RequestOptions): Promise<ModelDeleteResponse> {
    const id = FineTunesValidator.validateModel(model);

    return this.orchestrator.request(
      {
        method: 'DELETE',
        path: `/v1/models/${id}`,
        ...options,
      },
      modelDeleteResponseSchema
    );
  }
}
