import type { NormalizedConfig } from './config.js';
import type { FineTunesService } from '../services/fine-tunes/index.js';

export interface FineTunesClient {
  readonly fineTunes: FineTunesService;

  getConfig(): Readonly<NormalizedConfig>;
}

export { FineTunesClientImpl } from './client-impl.js';
export { createClient, createClientFromEnv } from './factory.js';
export {
  validateConfig,
  normalizeConfig,
  configFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_LOG_LEVEL,
} from './config.js';
export type { FineTunesClientConfig, NormalizedConfig } from './config.js';
