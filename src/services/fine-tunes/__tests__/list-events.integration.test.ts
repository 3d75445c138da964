import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createClient } from '../../../client/factory.js';
import type { FineTunesClientConfig } from '../../../client/config.js';
import {
  AuthenticationError,
  MimeTypeError,
  NotFoundError,
  UnsupportedFeatureError,
  ValidationError,
} from '../../../errors/categories.js';
import { createMockApi, lowerCaseKeys, JSON_HEADERS, TEST_BASE_URL, type MockApi } from '../../../__mocks__/mock-api.js';
import { createNotFoundError, createUnauthorizedError } from '../../../__fixtures__/errors.fixtures.js';
import type { Logger } from '../../../observability/logging.js';

const EVENTS_PATH = '/v1/fine-tunes/ft-abc123/events';

describe('listEvents against an in-process API', () => {
  let api: MockApi;

  function clientFor(overrides: Partial<FineTunesClientConfig> = {}) {
    return createClient({
      apiKey: 'test-secret',
      baseUrl: TEST_BASE_URL,
      dispatcher: api.agent,
      logLevel: 'off',
      ...overrides,
    });
  }

  function captureRequest(reply: { status: number; body: object }) {
    const captured: { headers: Record<string, string>; body: string } = { headers: {}, body: '' };
    api.pool
      .intercept({
        path: EVENTS_PATH,
        method: 'GET',
        headers: (headers: Record<string, string>) => {
          captured.headers = lowerCaseKeys(headers);
          return true;
        },
        body: (body: string) => {
          captured.body = body;
          return true;
        },
      })
      .reply(reply.status, reply.body, { headers: JSON_HEADERS });
    return captured;
  }

  beforeEach(() => {
    api = createMockApi();
  });

  afterEach(async () => {
    await api.close();
  });

  it('should return the event records from a successful response', async () => {
    captureRequest({ status: 200, body: { data: [{ level: 'info', message: 'Created fine-tune' }] } });

    const events = await clientFor().fineTunes.listEvents('ft-abc123');

    expect(events.data).toEqual([{ level: 'info', message: 'Created fine-tune' }]);
  });

  it('should send an authenticated GET with a stream: false body', async () => {
    const captured = captureRequest({ status: 200, body: { data: [] } });

    await clientFor().fineTunes.listEvents('ft-abc123');

    expect(captured.body).toBe('{"stream":false}');
    expect(captured.headers['authorization']).toBe('Bearer test-secret');
    expect(captured.headers['content-type']).toBe('application/json');
    expect(api.agent.pendingInterceptors()).toHaveLength(0);
  });

  it('should send the organization header when configured', async () => {
    const captured = captureRequest({ status: 200, body: { data: [] } });

    await clientFor({ organizationId: 'org-test' }).fineTunes.listEvents('ft-abc123');

    expect(captured.headers['openai-organization']).toBe('org-test');
  });

  it('should omit the organization header otherwise', async () => {
    const captured = captureRequest({ status: 200, body: { data: [] } });

    await clientFor().fineTunes.listEvents('ft-abc123');

    expect(captured.headers).not.toHaveProperty('openai-organization');
  });

  it('should surface the status and API message on failure', async () => {
    api.pool
      .intercept({ path: EVENTS_PATH, method: 'GET' })
      .reply(404, { error: { message: 'No such fine-tune job' } }, { headers: JSON_HEADERS });

    const error = await clientFor().fineTunes.listEvents('ft-abc123').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect((error as NotFoundError).message).toBe('OpenAI API request failed [404]: No such fine-tune job');
    expect((error as NotFoundError).message).toContain('404');
    expect((error as NotFoundError).message).toContain('No such fine-tune job');
  });

  it('should include the fine-tune id from a fixture error body', async () => {
    api.pool
      .intercept({ path: '/v1/fine-tunes/ft-missing/events', method: 'GET' })
      .reply(404, createNotFoundError('ft-missing'), { headers: JSON_HEADERS });

    await expect(clientFor().fineTunes.listEvents('ft-missing')).rejects.toThrow(
      'OpenAI API request failed [404]: No such fine-tune job: ft-missing'
    );
  });

  it('should report a rejected API key', async () => {
    api.pool
      .intercept({ path: EVENTS_PATH, method: 'GET' })
      .reply(401, createUnauthorizedError(), { headers: JSON_HEADERS });

    const error = await clientFor().fineTunes.listEvents('ft-abc123').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect((error as AuthenticationError).code).toBe('invalid_api_key');
  });

  it('should reject a non-JSON response', async () => {
    api.pool
      .intercept({ path: EVENTS_PATH, method: 'GET' })
      .reply(200, 'OK', { headers: { 'content-type': 'text/plain' } });

    await expect(clientFor().fineTunes.listEvents('ft-abc123')).rejects.toBeInstanceOf(MimeTypeError);
  });

  it('should not touch the network when stream is true', async () => {
    captureRequest({ status: 200, body: { data: [] } });

    await expect(clientFor().fineTunes.listEvents('ft-abc123', { stream: true })).rejects.toBeInstanceOf(
      UnsupportedFeatureError
    );
    expect(api.agent.pendingInterceptors()).toHaveLength(1);
  });

  it('should not touch the network when the id is empty', async () => {
    captureRequest({ status: 200, body: { data: [] } });

    await expect(clientFor().fineTunes.listEvents('')).rejects.toBeInstanceOf(ValidationError);
    expect(api.agent.pendingInterceptors()).toHaveLength(1);
  });

  it('should refuse to build a client without an API key', () => {
    expect(() => clientFor({ apiKey: '' })).toThrow(ValidationError);
  });

  it('should return identical results for identical calls', async () => {
    const body = { object: 'list', data: [{ object: 'fine-tune-event', created_at: 1, level: 'info', message: 'Job started' }] };
    api.pool.intercept({ path: EVENTS_PATH, method: 'GET' }).reply(200, body, { headers: JSON_HEADERS }).times(2);
    const client = clientFor();

    const first = await client.fineTunes.listEvents('ft-abc123');
    const second = await client.fineTunes.listEvents('ft-abc123');

    expect(second).toEqual(first);
    expect(first).toEqual(body);
  });

  it('should log through a custom logger', async () => {
    captureRequest({ status: 200, body: { data: [] } });
    const logger: Logger = {
      log: vi.fn(),
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    await clientFor({ logger }).fineTunes.listEvents('ft-abc123');

    expect(logger.debug).toHaveBeenCalledWith('[OpenAI] GET /v1/fine-tunes/ft-abc123/events');
  });
});
