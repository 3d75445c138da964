export type { FineTunesService } from './service.js';
export { FineTunesServiceImpl } from './service.js';
export type {
  FineTune,
  FineTuneList,
  FineTuneEvent,
  FineTuneEventList,
  FineTuneEventListParams,
  FineTuneCreateRequest,
  ModelDeleteResponse,
} from './types.js';
export {
  fineTuneSchema,
  fineTuneListSchema,
  fineTuneEventSchema,
  fineTuneEventListSchema,
  fineTuneCreateRequestSchema,
  modelDeleteResponseSchema,
} from './types.js';
export { FineTunesValidator } from './validation.js';
