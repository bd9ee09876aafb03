import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';

export const PRODUCTION_URL = 'https://openapi.investec.com';
export const SANDBOX_URL = 'https://openapisandbox.investec.com';

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase() === 'true');

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Investec API credentials
  INVESTEC_CLIENT_ID: z.string().min(1),
  INVESTEC_CLIENT_SECRET: z.string().min(1),
  INVESTEC_API_KEY: z.string().min(1),
  INVESTEC_USE_SANDBOX: booleanFlag,
  INVESTEC_TIMEOUT: z.coerce
    .number()
    .int()
    .min(1, { message: 'INVESTEC_TIMEOUT must be at least 1 second' })
    .default(30),
  INVESTEC_PRODUCTION_URL: z.string().url().default(PRODUCTION_URL),
  INVESTEC_SANDBOX_URL: z.string().url().default(SANDBOX_URL),

  // Tool server transport
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  PORT: z.coerce.number().int().default(3000),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Rate limiting (HTTP transport)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
});

export type Env = z.infer<typeof envSchema>;

/** Investec variables also accepted without the INVESTEC_ prefix */
const UNPREFIXED_ALIASES = [
  'CLIENT_ID',
  'CLIENT_SECRET',
  'API_KEY',
  'USE_SANDBOX',
  'TIMEOUT',
  'PRODUCTION_URL',
  'SANDBOX_URL',
] as const;

/**
 * Fills each INVESTEC_* variable from its bare name when the prefixed one is unset.
 * Empty strings count as unset.
 */
export function resolveEnvAliases(
  source: Record<string, string | undefined>
): Record<string, string | undefined> {
  const resolved: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== '') resolved[key] = value;
  }
  for (const alias of UNPREFIXED_ALIASES) {
    const prefixed = `INVESTEC_${alias}`;
    if (resolved[prefixed] === undefined && resolved[alias] !== undefined) {
      resolved[prefixed] = resolved[alias];
    }
  }
  return resolved;
}

/**
 * Parses environment variables, throwing ConfigError on failure
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  try {
    return envSchema.parse(resolveEnvAliases(source));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        'Environment validation failed',
        error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }
    throw error;
  }
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError && Array.isArray(error.details)) {
      console.error('❌ Environment validation failed:');
      error.details.forEach((issue: { path: string; message: string }) => {
        console.error(`  - ${issue.path}: ${issue.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
