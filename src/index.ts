export { InvestecClient, API_PREFIX } from './infra/investec/InvestecClient.js';
export type { ApiDate, InvestecClientOptions, TransactionQuery } from './infra/investec/InvestecClient.js';
export {
  createInvestecConfig,
  describeInvestecConfig,
  resolveBaseUrl,
  DEFAULT_TIMEOUT_SECONDS,
  TOKEN_PATH,
} from './infra/investec/config.js';
export type { InvestecConfig } from './infra/investec/config.js';
export { TokenManager } from './infra/investec/TokenManager.js';
export type { TokenState, TokenManagerOptions } from './infra/investec/TokenManager.js';
export type { FetchLike } from './infra/investec/http.js';
export { parseEnv, PRODUCTION_URL, SANDBOX_URL } from './infra/env.js';
export type { Env } from './infra/env.js';
export { createMcpServer } from './mcp/tools.js';
export * from './domain/errors.js';
export * from './domain/entities/index.js';
