import type { FineTunesClient } from './index.js';
import type { FineTunesClientConfig } from './config.js';
import { FineTunesClientImpl } from './client-impl.js';
import { validateConfig, configFromEnv } from './config.js';

export function createClient(config: FineTunesClientConfig): FineTunesClient {
  validateConfig(config);
  return new FineTunesClientImpl(config);
}

/**
 * Builds a client from environment variables. `overrides` win over the
 * environment, which is read here and nowhere else.
 */
export function createClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<FineTunesClientConfig> = {}
): FineTunesClient {
  return createClient(configFromEnv(env, overrides));
}
