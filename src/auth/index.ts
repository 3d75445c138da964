export type { AuthManager, AuthConfig } from './auth-manager.js';
export { BearerAuthManager, createAuthManager } from './auth-manager.js';
