#!/usr/bin/env node
import dotenv from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createInvestecConfig, describeInvestecConfig } from './infra/investec/config.js';
import { InvestecClient } from './infra/investec/InvestecClient.js';
import { createMcpServer } from './mcp/tools.js';
import { createHttpApp } from './api/httpApp.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const config = createInvestecConfig(env);
loggerInstance.debug('Investec client configuration', describeInvestecConfig(config));
const client = new InvestecClient(config);

if (env.MCP_TRANSPORT === 'stdio') {
  const server = createMcpServer(client);
  await server.connect(new StdioServerTransport());
  loggerInstance.info('Tool server listening on stdio', { sandbox: config.useSandbox });

  process.on('SIGTERM', () => {
    loggerInstance.info('SIGTERM received, shutting down gracefully');
    server
      .close()
      .catch((error: unknown) => {
        loggerInstance.error('Failed to close tool server', {
          message: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => process.exit(0));
  });
} else {
  const app = createHttpApp(client, env);

  const httpServer = app.listen(env.PORT, () => {
    loggerInstance.info('Server started', {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      sandbox: config.useSandbox,
    });
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    loggerInstance.info('SIGTERM received, shutting down gracefully');
    httpServer.close(() => {
      loggerInstance.info('Server closed');
      process.exit(0);
    });
  });
}
