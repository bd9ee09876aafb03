import { ApiError, RateLimitError, RequestError } from '../../domain/errors.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string>;

/**
 * `new URL` resolution: an absolute path replaces whatever path the base carries
 */
export function buildUrl(baseUrl: string, path: string, query?: QueryParams): URL {
  const url = new URL(path, baseUrl);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
  }
  return url;
}

/**
 * Dates go on the wire as YYYY-MM-DD (UTC); strings are sent as given
 */
export function formatApiDate(value: string | Date): string {
  if (typeof value === 'string') return value;
  if (Number.isNaN(value.getTime())) {
    throw new ApiError('Invalid date value', { code: 'INVESTEC_INVALID_DATE' });
  }
  return value.toISOString().slice(0, 10);
}

export function parseJsonBody(text: string): unknown {
  return JSON.parse(text) as unknown;
}

function tryParseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return parseJsonBody(text);
  } catch {
    return undefined;
  }
}

/**
 * Maps a non-2xx response to RequestError, or RateLimitError for 429
 */
export async function toRequestError(response: Response, description: string): Promise<RequestError> {
  const text = await response.text().catch(() => '');
  const body = tryParseJson(text);

  if (response.status === 429) {
    return new RateLimitError('Rate limit exceeded, retry after a delay', response.status, body);
  }
  const statusText = response.statusText ? ` ${response.statusText}` : '';
  return new RequestError(
    `HTTP error occurred: ${response.status}${statusText} for ${description}`,
    response.status,
    body
  );
}

export function describeCause(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') return 'request timed out';
    return error.message;
  }
  return String(error);
}

/**
 * Runs fetch, wrapping transport failures (DNS, refused connection, timeout) in ApiError
 */
export async function sendRequest(
  fetchImpl: FetchLike,
  url: URL,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  try {
    return await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new ApiError(`Request failed: ${describeCause(error)}`, { cause: error });
  }
}
