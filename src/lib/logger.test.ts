import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { configureLogging, createLogger, formatLogLine, redactSensitiveFields } from './logger.js';

describe('redactSensitiveFields', () => {
  it('redacts sensitive string fields at any depth', () => {
    const result = redactSensitiveFields({
      apiKey: 'test-secret',
      nested: { authToken: 'test-secret', count: 2 },
      list: [{ password: 'test-secret' }],
    });

    expect(result).toEqual({
      apiKey: '[REDACTED]',
      nested: { authToken: '[REDACTED]', count: 2 },
      list: [{ password: '[REDACTED]' }],
    });
  });

  it('redacts the account SID but keeps message SIDs', () => {
    expect(redactSensitiveFields({ accountSid: 'test-account-sid', sid: 'SM0001' })).toEqual({
      accountSid: '[REDACTED]',
      sid: 'SM0001',
    });
  });

  it('reduces errors to name and message', () => {
    expect(redactSensitiveFields({ error: new TypeError('bad input') })).toEqual({
      error: { name: 'TypeError', message: 'bad input' },
    });
  });
});

describe('formatLogLine', () => {
  it('renders timestamp, level, scope, message and context', () => {
    const line = formatLogLine('info', 'scraper', 'Found events', { count: 2 }, new Date('2024-10-05T20:00:00.000Z'));

    expect(line).toBe('2024-10-05T20:00:00.000Z INFO  [scraper] Found events {"count":2}');
  });

  it('omits the timestamp and empty context', () => {
    expect(formatLogLine('warn', 'cli', 'careful', {}, null)).toBe('WARN  [cli] careful');
  });
});

describe('createLogger', () => {
  beforeEach(() => {
    configureLogging({ level: 'info', colors: false, timestamps: false, file: undefined });
  });

  afterEach(() => {
    configureLogging({ level: 'info', colors: true, timestamps: true, file: undefined });
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    configureLogging({ level: 'warn' });

    const logger = createLogger('test');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('WARN  [test] shown');
  });

  it('writes errors to console.error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('test').error('boom', { token: 'test-secret' });

    expect(error).toHaveBeenCalledWith('ERROR [test] boom {"token":"[REDACTED]"}');
  });

  it('appends plain lines to the log file', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const dir = mkdtempSync(join(tmpdir(), 'daily-brief-log-'));
    const file = join(dir, 'brief.log');
    try {
      configureLogging({ file, colors: true });

      const logger = createLogger('test');
      logger.info('first');
      logger.info('second');

      expect(readFileSync(file, 'utf-8')).toBe('INFO  [test] first\nINFO  [test] second\n');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
