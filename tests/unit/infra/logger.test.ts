import { describe, it, expect } from 'vitest';
import { createLogger, redactSecrets } from '../../../src/infra/logger.js';

describe('redactSecrets', () => {
  it('masks bearer and basic credentials inside strings', () => {
    expect(redactSecrets('Authorization: Bearer abc.def-123')).toBe(
      'Authorization: Bearer ***REDACTED***'
    );
    expect(redactSecrets('Basic dGVzdDp0ZXN0')).toBe('Basic ***REDACTED***');
  });

  it('masks key=value secrets', () => {
    expect(redactSecrets('client_secret=test-secret&grant_type=client_credentials')).toBe(
      'client_secret=***REDACTED***&grant_type=client_credentials'
    );
  });

  it('masks secret-named keys at any depth', () => {
    expect(
      redactSecrets({
        clientId: 'test-client',
        nested: { apiKey: 'test-api-key', items: [{ access_token: 'tok' }] },
      })
    ).toEqual({
      clientId: 'test-client',
      nested: { apiKey: '***REDACTED***', items: [{ access_token: '***REDACTED***' }] },
    });
  });

  it('leaves other values untouched', () => {
    expect(redactSecrets(42)).toBe(42);
    expect(redactSecrets(null)).toBeNull();
    expect(redactSecrets('GET /za/pb/v1/accounts')).toBe('GET /za/pb/v1/accounts');
  });
});

describe('createLogger', () => {
  it('uses the configured level', () => {
    const logger = createLogger({ NODE_ENV: 'test', LOG_LEVEL: 'debug', LOG_FILE: undefined });
    expect(logger.level).toBe('debug');
    expect(logger.transports).toHaveLength(1);
  });
});
