import crypto from 'node:crypto';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, hashId, parseLogLevel, sanitizeFields } from '../../src/logging/logger.js';

describe('logger', () => {
  afterEach(() => {
    createLogger('reset', { hashSalt: '' });
  });

  it('writes JSON lines with the component name', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('host', { level: 'info' }).child('queue');

    logger.info('Queue ready', { length: 3 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(logSpy.mock.calls[0][0])) as Record<string, unknown>;
    expect(entry.level).toBe('info');
    expect(entry.component).toBe('host.queue');
    expect(entry.message).toBe('Queue ready');
    expect(entry.length).toBe(3);
  });

  it('filters below the configured level and routes warnings to stderr', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('host', { level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('redacts and truncates field values', () => {
    const fields = sanitizeFields(
      {
        upn: 'person@contoso.test',
        url: 'https://contoso.test/path',
        token: 'Bearer abc.def',
        error: new Error('failed for person@contoso.test'),
        long: 'x'.repeat(20)
      },
      10
    );

    expect(fields.upn).toBe('[REDACTED_...');
    expect(fields.url).toBe('[REDACTED_...');
    expect(fields.token).toBe('Bearer [RE...');
    expect(fields.error).toEqual({ name: 'Error', message: 'failed for...' });
    expect(fields.long).toBe('xxxxxxxxxx...');
  });

  it('hashes identifiers with a stable 16 character digest', () => {
    expect(hashId('user-1')).toHaveLength(16);
    expect(hashId('user-1')).toBe(hashId('user-1'));
    expect(hashId('user-1')).not.toBe(hashId('user-2'));
    expect(hashId(undefined)).toBe('unknown');
  });

  it('salts hashed identifiers with the configured salt', () => {
    const unsalted = hashId('user-1');
    createLogger('host', { hashSalt: 'test-salt' });

    expect(hashId('user-1')).toBe(crypto.createHash('sha256').update('test-salt:user-1').digest('hex').slice(0, 16));
    expect(hashId('user-1')).not.toBe(unsalted);
  });

  it('parses log levels', () => {
    expect(parseLogLevel(' Error ')).toBe('error');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
