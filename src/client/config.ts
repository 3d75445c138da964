import { z } from 'zod';
import type { Dispatcher } from 'undici';
import { ValidationError } from '../errors/categories.js';
import { LOG_LEVELS, type Logger, type LogLevel } from '../observability/logging.js';

export interface FineTunesClientConfig {
  apiKey: string;
  /** API origin without the `/v1` prefix. */
  baseUrl?: string;
  organizationId?: string;
  timeout?: number;
  defaultHeaders?: Record<string, string>;
  logLevel?: LogLevel;
  /** Replaces the console logger built from `logLevel`. */
  logger?: Logger;
  /** undici dispatcher used for every request, e.g. a proxy agent. */
  dispatcher?: Dispatcher;
}

export interface NormalizedConfig {
  apiKey: string;
  baseUrl: string;
  organizationId?: string;
  timeout: number;
  defaultHeaders: Record<string, string>;
  logLevel: LogLevel;
}

export const DEFAULT_BASE_URL = 'https://api.openai.com';
export const DEFAULT_TIMEOUT = 60000;
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const configSchema = z.object({
  apiKey: z
    .string({
      required_error: 'API key is required',
      invalid_type_error: 'API key must be a single string',
    })
    .min(1, 'API key cannot be empty'),
  baseUrl: z.string().url('Base URL must be a valid URL').optional(),
  organizationId: z
    .string({ invalid_type_error: 'Organization ID must be a single string' })
    .min(1, 'Organization ID cannot be empty')
    .optional(),
  timeout: z.number().positive('Timeout must be positive').optional(),
  defaultHeaders: z.record(z.string()).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export function validateConfig(config: FineTunesClientConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid client configuration', {
      param: issue?.path.join('.'),
    });
  }
}

export function normalizeConfig(config: FineTunesClientConfig): NormalizedConfig {
  return {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
    organizationId: config.organizationId,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    defaultHeaders: { ...config.defaultHeaders },
    logLevel: config.logLevel ?? DEFAULT_LOG_LEVEL,
  };
}

/**
 * Reads `OPENAI_API_KEY`, `OPENAI_API_URL` and `OPENAI_ORGANIZATION`.
 * Empty variables count as unset. `overrides` win over the environment, so
 * `OPENAI_API_KEY` may be left unset when they carry an `apiKey`.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<FineTunesClientConfig> = {}
): FineTunesClientConfig {
  const apiKey = overrides.apiKey ?? (env.OPENAI_API_KEY || undefined);
  if (apiKey === undefined) {
    throw new ValidationError('OPENAI_API_KEY environment variable is not set', { param: 'apiKey' });
  }
  return {
    baseUrl: env.OPENAI_API_URL || undefined,
    organizationId: env.OPENAI_ORGANIZATION || undefined,
    ...overrides,
    apiKey,
  };
}
