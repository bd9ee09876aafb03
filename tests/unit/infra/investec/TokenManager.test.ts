import { describe, it, expect, vi } from 'vitest';
import { AuthError } from '../../../../src/domain/errors.js';
import { TokenManager } from '../../../../src/infra/investec/TokenManager.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../../src/infra/logger.js', () => loggerMock);

const T0 = 1_700_000_000_000;

function createManager(fetchImpl: (input: string | URL, init?: RequestInit) => Promise<Response>, clock = { now: T0 }) {
  return new TokenManager({
    tokenUrl: 'https://sandbox.example.test/identity/v2/oauth2/token',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    apiKey: 'test-api-key',
    timeoutMs: 1000,
    fetch: fetchImpl,
    now: () => clock.now,
  });
}

describe('TokenManager', () => {
  it('starts without a token', () => {
    const manager = createManager(vi.fn());
    expect(manager.state).toBe('no-token');
    expect(manager.expiresAt).toBeNull();
  });

  it('subtracts the safety margin from expires_in', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ access_token: 'tok', expires_in: 1799 })));
    const manager = createManager(fetchMock);

    await expect(manager.getAccessToken()).resolves.toBe('tok');
    expect(manager.expiresAt).toBe(T0 + 1739 * 1000);
    expect(manager.state).toBe('valid');
  });

  it('accepts expires_in as a string and defaults it when missing', async () => {
    const withString = createManager(
      vi.fn(async () => new Response(JSON.stringify({ access_token: 'tok', expires_in: '300' })))
    );
    const withoutExpiry = createManager(
      vi.fn(async () => new Response(JSON.stringify({ access_token: 'tok' })))
    );

    await withString.getAccessToken();
    await withoutExpiry.getAccessToken();

    expect(withString.expiresAt).toBe(T0 + 240_000);
    expect(withoutExpiry.expiresAt).toBe(T0 + 1739 * 1000);
  });

  it('treats the token as expired exactly at expiresAt', async () => {
    const clock = { now: T0 };
    const manager = createManager(
      vi.fn(async () => new Response(JSON.stringify({ access_token: 'tok', expires_in: 120 }))),
      clock
    );
    await manager.getAccessToken();

    clock.now = T0 + 59_999;
    expect(manager.state).toBe('valid');
    clock.now = T0 + 60_000;
    expect(manager.state).toBe('expired');
  });

  it('shares one in-flight refresh between concurrent callers', async () => {
    let release: (response: Response) => void = () => undefined;
    const fetchMock = vi.fn(
      () =>
        new Promise<Response>((resolve) => {
          release = resolve;
        })
    );
    const manager = createManager(fetchMock);

    const first = manager.getAccessToken();
    const second = manager.getAccessToken();
    release(new Response(JSON.stringify({ access_token: 'shared', expires_in: 1799 })));

    await expect(Promise.all([first, second])).resolves.toEqual(['shared', 'shared']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('allows a new attempt after a failed refresh', async () => {
    const fetchMock = vi
      .fn(async () => new Response(JSON.stringify({ access_token: 'tok-2', expires_in: 1799 })))
      .mockResolvedValueOnce(new Response('{}', { status: 503 }));
    const manager = createManager(fetchMock);

    await expect(manager.getAccessToken()).rejects.toBeInstanceOf(AuthError);
    await expect(manager.getAccessToken()).resolves.toBe('tok-2');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('raises AuthError for a token response that is not JSON', async () => {
    const manager = createManager(vi.fn(async () => new Response('not json')));
    await expect(manager.getAccessToken()).rejects.toBeInstanceOf(AuthError);
  });
});
