import { AuthenticationError } from '../errors/categories.js';

export interface AuthManager {
  applyAuth(headers: Record<string, string>): void;
  validate(): void;
}

export interface AuthConfig {
  apiKey: string;
  organizationId?: string;
}

export class BearerAuthManager implements AuthManager {
  constructor(private readonly config: AuthConfig) {}

  applyAuth(headers: Record<string, string>): void {
    headers['Authorization'] = `Bearer ${this.config.apiKey}`;

    if (this.config.organizationId) {
      headers['OpenAI-Organization'] = this.config.organizationId;
    }
  }

  validate(): void {
    if (!this.config.apiKey) {
      throw new AuthenticationError('API key is required');
    }
  }
}

export function createAuthManager(config: AuthConfig): AuthManager {
  const manager = new BearerAuthManager(config);
  manager.validate();
  return manager;
}
