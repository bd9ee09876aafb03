import express from 'express';
import cors from 'cors';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Express, Request, Response, NextFunction } from 'express';
import type { InvestecClient } from '../infra/investec/InvestecClient.js';
import type { Env } from '../infra/env.js';
import { logger } from '../infra/logger.js';
import { createRateLimiter } from '../infra/rateLimiter.js';
import { createMcpServer } from '../mcp/tools.js';
import { createErrorHandler, notFoundHandler } from './errorHandler.js';

export type HttpAppEnv = Pick<Env, 'NODE_ENV' | 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX_REQUESTS'>;

function methodNotAllowed(_req: Request, res: Response): void {
  res.status(405).json({
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Method not allowed.' },
    id: null,
  });
}

/**
 * Express app serving the tool server over streamable HTTP.
 * Stateless: every POST /mcp gets its own server and transport.
 */
export function createHttpApp(client: InvestecClient, env: HttpAppEnv): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      token: client.tokenState,
    });
  });

  app.post(
    '/mcp',
    createRateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS }),
    async (req: Request, res: Response, next: NextFunction) => {
      const server = createMcpServer(client);
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

      res.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          logger.warn('Failed to close MCP transport', {
            message: error instanceof Error ? error.message : String(error),
          });
        });
      });

      try {
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        next(error);
      }
    }
  );
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);

  app.use(notFoundHandler);
  app.use(createErrorHandler(env));

  return app;
}
