import type { Env } from '../env.js';

/**
 * Connection settings for one InvestecClient, built once at startup
 */
export interface InvestecConfig {
  clientId: string;
  clientSecret: string;
  apiKey: string;
  useSandbox: boolean;
  timeoutSeconds: number;
  productionUrl: string;
  sandboxUrl: string;
}

export const DEFAULT_TIMEOUT_SECONDS = 30;
export const TOKEN_PATH = '/identity/v2/oauth2/token';

export function createInvestecConfig(env: Env): InvestecConfig {
  return {
    clientId: env.INVESTEC_CLIENT_ID,
    clientSecret: env.INVESTEC_CLIENT_SECRET,
    apiKey: env.INVESTEC_API_KEY,
    useSandbox: env.INVESTEC_USE_SANDBOX,
    timeoutSeconds: env.INVESTEC_TIMEOUT,
    productionUrl: env.INVESTEC_PRODUCTION_URL,
    sandboxUrl: env.INVESTEC_SANDBOX_URL,
  };
}

export function resolveBaseUrl(config: InvestecConfig): string {
  return config.useSandbox ? config.sandboxUrl : config.productionUrl;
}

/**
 * Loggable summary; credentials are masked
 */
export function describeInvestecConfig(config: InvestecConfig): Record<string, unknown> {
  return {
    clientId: config.clientId ? `${config.clientId.slice(0, 4)}...` : 'Not set',
    clientSecret: config.clientSecret ? '***' : 'Not set',
    apiKey: config.apiKey ? '***' : 'Not set',
    useSandbox: config.useSandbox,
    timeout: config.timeoutSeconds,
    baseUrl: resolveBaseUrl(config),
  };
}
