import type { FineTunesClient } from './index.js';
import type { FineTunesClientConfig, NormalizedConfig } from './config.js';
import type { FineTunesService } from '../services/fine-tunes/index.js';
import { FineTunesServiceImpl } from '../services/fine-tunes/index.js';
import { UndiciHttpTransport } from '../transport/http-transport.js';
import { DefaultRequestOrchestrator } from '../pipeline/orchestrator.js';
import { LoggingHooks } from '../pipeline/hooks.js';
import { createLogger } from '../observability/logging.js';
import { createAuthManager } from '../auth/auth-manager.js';
import { normalizeConfig } from './config.js';

export class FineTunesClientImpl implements FineTunesClient {
  public readonly fineTunes: FineTunesService;

  private readonly config: NormalizedConfig;

  constructor(config: FineTunesClientConfig) {
    this.config = normalizeConfig(config);

    const authManager = createAuthManager({
      apiKey: this.config.apiKey,
      organizationId: this.config.organizationId,
    });

    const defaultHeaders: Record<string, string> = {
      ...this.config.defaultHeaders,
      'Content-Type': 'application/json',
    };
    authManager.applyAuth(defaultHeaders);

    const transport = new UndiciHttpTransport(
      this.config.baseUrl,
      defaultHeaders,
      this.config.timeout,
      config.dispatcher
    );

    const logger = config.logger ?? createLogger({ level: this.config.logLevel });
    const orchestrator = new DefaultRequestOrchestrator(transport).use(new LoggingHooks(logger));

    this.fineTunes = new FineTunesServiceImpl(orchestrator);
  }

  getConfig(): Readonly<NormalizedConfig> {
    return { ...this.config, defaultHeaders: { ...this.config.defaultHeaders } };
  }
}
