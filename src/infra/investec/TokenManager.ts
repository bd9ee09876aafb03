import { AuthError } from '../../domain/errors.js';
import { asWireRecord, readOptionalString } from '../../domain/entities/wire.js';
import { logger } from '../logger.js';
import { describeCause, type FetchLike } from './http.js';

export const DEFAULT_EXPIRES_IN_SECONDS = 1799;
export const EXPIRY_MARGIN_SECONDS = 60;

export type TokenState = 'no-token' | 'valid' | 'expired';

export interface TokenManagerOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  apiKey: string;
  timeoutMs: number;
  fetch: FetchLike;
  now: () => number;
}

interface IssuedToken {
  accessToken: string;
  expiresAt: number;
}

function parseExpiresIn(value: unknown): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : DEFAULT_EXPIRES_IN_SECONDS;
}

/**
 * OAuth2 client-credentials token holder
 *
 * A token counts as expired once `now >= expiresAt`, where expiresAt sits
 * EXPIRY_MARGIN_SECONDS before the expiry the API reported. Refresh happens
 * inline on the call that finds the token missing or expired; concurrent
 * callers share the same in-flight refresh.
 */
export class TokenManager {
  private token: IssuedToken | null = null;
  private refreshing: Promise<string> | null = null;

  constructor(private readonly options: TokenManagerOptions) {}

  get state(): TokenState {
    if (!this.token) return 'no-token';
    return this.token.expiresAt > this.options.now() ? 'valid' : 'expired';
  }

  get expiresAt(): number | null {
    return this.token?.expiresAt ?? null;
  }

  async getAccessToken(): Promise<string> {
    if (this.token && this.state === 'valid') {
      return this.token.accessToken;
    }

    if (!this.refreshing) {
      this.refreshing = this.authenticate().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  invalidate(): void {
    this.token = null;
  }

  private async authenticate(): Promise<string> {
    const { tokenUrl, clientId, clientSecret, apiKey, timeoutMs } = this.options;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    this.token = null;
    logger.debug('Requesting Investec access token', { tokenUrl });

    let response: Response;
    try {
      response = await this.options.fetch(tokenUrl, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          'x-api-key': apiKey,
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      logger.error('Investec token request failed', { message: describeCause(error) });
      throw new AuthError(`Authentication request failed: ${describeCause(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      logger.error('Investec authentication rejected', { statusCode: response.status });
      throw new AuthError(`Authentication failed: HTTP ${response.status}`, {
        details: { statusCode: response.status },
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await response.text()) as unknown;
    } catch (error) {
      throw new AuthError(`Authentication request failed: ${describeCause(error)}`, {
        cause: error,
      });
    }

    const data = asWireRecord(payload);
    const accessToken = readOptionalString(data, 'access_token');
    if (!accessToken) {
      throw new AuthError('No access token in response');
    }

    const expiresIn = parseExpiresIn(data.expires_in);
    this.token = {
      accessToken,
      expiresAt: this.options.now() + (expiresIn - EXPIRY_MARGIN_SECONDS) * 1000,
    };

    logger.info('Investec access token acquired', { expiresIn });
    return accessToken;
  }
}
