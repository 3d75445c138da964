import { MockAgent } from 'undici';

export const TEST_BASE_URL = 'https://api.openai.test';

export const JSON_HEADERS = { 'content-type': 'application/json' };

export interface MockApi {
  agent: MockAgent;
  pool: ReturnType<MockAgent['get']>;
  close(): Promise<void>;
}

/**
 * In-process stand-in for the API. Requests without a matching intercept
 * fail instead of reaching the network.
 */
export function createMockApi(origin: string = TEST_BASE_URL): MockApi {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return {
    agent,
    pool: agent.get(origin),
    close: () => agent.close(),
  };
}

export function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
}
