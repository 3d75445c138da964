import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, NoopLogger, createLogger } from '../logging.js';

describe('ConsoleLogger', () => {
  it('should write messages at or above the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'info', includeTimestamps: false });

    logger.debug('hidden');
    logger.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith('[INFO] shown');
  });

  it('should route warnings and errors to the matching console methods', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'warn', includeTimestamps: false });

    logger.warn('careful');
    logger.error('broken');

    expect(warn).toHaveBeenCalledWith('[WARN] careful');
    expect(error).toHaveBeenCalledWith('[ERROR] broken');
  });

  it('should redact secret-looking keys in context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'info', includeTimestamps: false });

    logger.info('request', { apiKey: 'test-secret', nested: { authorization: 'Bearer test-secret', ok: 1 } });

    expect(log).toHaveBeenCalledWith(
      '[INFO] request {"apiKey":"[REDACTED]","nested":{"authorization":"[REDACTED]","ok":1}}'
    );
  });

  it('should leave context untouched when redaction is off', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'info', includeTimestamps: false, redactSensitive: false });

    logger.info('request', { token: 'test-token' });

    expect(log).toHaveBeenCalledWith('[INFO] request {"token":"test-token"}');
  });

  it('should prefix a timestamp by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.warn('careful');

    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] careful$/));
  });
});

describe('createLogger', () => {
  it('should return a no-op logger when logging is off', () => {
    expect(createLogger({ level: 'off' })).toBeInstanceOf(NoopLogger);
  });

  it('should return a console logger otherwise', () => {
    expect(createLogger({ level: 'debug' })).toBeInstanceOf(ConsoleLogger);
  });
});
