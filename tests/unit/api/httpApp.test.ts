import { afterEach, describe, it, expect, vi } from 'vitest';
import express from 'express';
import type { Server } from 'node:http';
import type { Express } from 'express';
import { createHttpApp } from '../../../src/api/httpApp.js';
import { statusForError } from '../../../src/api/errorHandler.js';
import { ApiError, AuthError, RateLimitError, RequestError, ValidationError } from '../../../src/domain/errors.js';
import { InvestecClient } from '../../../src/infra/investec/InvestecClient.js';
import { createRateLimiter } from '../../../src/infra/rateLimiter.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const servers: Server[] = [];

async function listen(app: Express): Promise<string> {
  const server = await new Promise<Server>((resolve) => {
    const started = app.listen(0, '127.0.0.1', () => resolve(started));
  });
  servers.push(server);
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) => new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())))
    )
  );
});

function createClient(): InvestecClient {
  return new InvestecClient(
    {
      clientId: 'test-client',
      clientSecret: 'test-secret',
      apiKey: 'test-api-key',
      useSandbox: true,
      timeoutSeconds: 30,
      productionUrl: 'https://production.example.test',
      sandboxUrl: 'https://sandbox.example.test',
    },
    { fetch: vi.fn() }
  );
}

const env = { NODE_ENV: 'test', RATE_LIMIT_WINDOW_MS: 60_000, RATE_LIMIT_MAX_REQUESTS: 120 } as const;

describe('createHttpApp', () => {
  it('reports health with the token state', async () => {
    const baseUrl = await listen(createHttpApp(createClient(), env));

    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', token: 'no-token' });
  });

  it('answers unknown routes with 404', async () => {
    const baseUrl = await listen(createHttpApp(createClient(), env));

    const response = await fetch(`${baseUrl}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: 'NOT_FOUND',
      message: 'The requested resource was not found',
    });
  });

  it('rejects GET on the tool endpoint', async () => {
    const baseUrl = await listen(createHttpApp(createClient(), env));

    const response = await fetch(`${baseUrl}/mcp`);

    expect(response.status).toBe(405);
  });
});

describe('createRateLimiter', () => {
  function limitedApp(now: () => number): Express {
    const app = express();
    app.get('/limited', createRateLimiter({ windowMs: 1000, max: 2, now }), (_req, res) => {
      res.json({ ok: true });
    });
    return app;
  }

  it('allows requests up to the limit, then answers 429', async () => {
    const baseUrl = await listen(limitedApp(() => 5_000));

    const first = await fetch(`${baseUrl}/limited`);
    const second = await fetch(`${baseUrl}/limited`);
    const third = await fetch(`${baseUrl}/limited`);

    expect(first.status).toBe(200);
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
    expect(second.headers.get('X-RateLimit-Remaining')).toBe('0');
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).toBe('1');
    expect(await third.json()).toEqual({
      error: 'rate_limited',
      message: 'Too many requests. Please retry later.',
    });
  });

  it('opens a new window once the old one resets', async () => {
    const clock = { now: 5_000 };
    const baseUrl = await listen(limitedApp(() => clock.now));

    await fetch(`${baseUrl}/limited`);
    await fetch(`${baseUrl}/limited`);
    clock.now = 6_000;
    const response = await fetch(`${baseUrl}/limited`);

    expect(response.status).toBe(200);
    expect(response.headers.get('X-RateLimit-Reset')).toBe('7000');
  });

  it('is disabled by a non-positive max', async () => {
    const app = express();
    app.get('/open', createRateLimiter({ windowMs: 1000, max: 0 }), (_req, res) => {
      res.json({ ok: true });
    });
    const baseUrl = await listen(app);

    const response = await fetch(`${baseUrl}/open`);

    expect(response.status).toBe(200);
    expect(response.headers.get('X-RateLimit-Limit')).toBeNull();
  });
});

describe('statusForError', () => {
  it.each([
    [new ValidationError('bad input'), 400],
    [new RateLimitError('slow down', 429), 429],
    [new RequestError('missing', 404), 404],
    [new RequestError('server error', 500), 502],
    [new AuthError('denied'), 502],
    [new ApiError('timeout'), 502],
    [new ApiError('Invalid date value', { code: 'INVESTEC_INVALID_DATE' }), 400],
  ])('maps %s to %i', (error, status) => {
    expect(statusForError(error)).toBe(status);
  });
});
