/**
 * Credential masking in error messages and log output.
 */

import { maskSecret, maskSecretsInMessage, redactUrl } from '../../src/domain/errors';
import { LogEntry, clearSecrets, createLogger, registerSecret, resetLogHandler, setLogHandler } from '../../src/logger';

describe('maskSecret', () => {
  it('masks all but last 4 characters for long secrets', () => {
    const secret = 'test-secret-0001';
    expect(maskSecret(secret)).toBe('*'.repeat(secret.length - 4) + '0001');
  });

  it('fully masks secrets shorter than 8 characters', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('1234567')).toBe('****');
  });

  it('preserves last 4 characters for 8-character secrets', () => {
    expect(maskSecret('12345678')).toBe('****5678');
  });

  it('handles empty string', () => {
    expect(maskSecret('')).toBe('****');
  });
});

describe('maskSecretsInMessage', () => {
  it('masks every occurrence', () => {
    const result = maskSecretsInMessage('token test-secret rejected; retried test-secret', ['test-secret']);
    expect(result).toBe('token *******cret rejected; retried *******cret');
  });

  it('masks multiple different secrets', () => {
    const result = maskSecretsInMessage('a=market-token-1 b=hub-token-22', ['market-token-1', 'hub-token-22']);
    expect(result).toBe('a=**********en-1 b=********n-22');
  });

  it('returns unchanged message when no secrets match', () => {
    expect(maskSecretsInMessage('No secrets here', ['notfound'])).toBe('No secrets here');
  });

  it('handles secrets with regex-special characters', () => {
    expect(maskSecretsInMessage('Failed with key+special.chars?', ['key+special.chars?'])).toBe(
      'Failed with **************ars?',
    );
  });
});

describe('redactUrl', () => {
  it('drops the query string of presigned URLs', () => {
    expect(redactUrl('https://storage.test/files/model.safetensors?X-Amz-Signature=abc')).toBe(
      'https://storage.test/files/model.safetensors?…',
    );
  });

  it('keeps URLs without a query', () => {
    expect(redactUrl('https://hub.test/org/model-a')).toBe('https://hub.test/org/model-a');
  });

  it('returns unparseable input unchanged', () => {
    expect(redactUrl('not a url')).toBe('not a url');
  });
});

describe('logger secret masking', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
    clearSecrets();
  });

  it('masks registered secrets in messages and string context values', () => {
    registerSecret('test-secret');
    createLogger({ component: 'test' }).warn('sent test-secret', { header: 'Bearer test-secret', attempt: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('sent *******cret');
    expect(entries[0].context).toEqual({ component: 'test', header: 'Bearer *******cret', attempt: 2 });
  });

  it('ignores blank registrations', () => {
    registerSecret('   ');
    registerSecret(undefined);
    createLogger().info('plain message');
    expect(entries[0].message).toBe('plain message');
  });

  it('child loggers keep parent context', () => {
    createLogger({ runId: 'run_1' }).child({ identifier: '42' }).error('failed');
    expect(entries[0].context).toEqual({ runId: 'run_1', identifier: '42' });
  });
});
