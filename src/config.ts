/** Config loader + validation */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('./data/database.db'),
  // Remote SQLite file fetched when DATABASE_PATH does not exist yet
  DATABASE_URL: z.string().url().optional(),
  // SQL script used to seed a fresh database instead of the sample schema
  DATABASE_SEED: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  // Not z.coerce.boolean(): Boolean("false") is true.
  ALLOW_CTE: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
  BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface GatewayConfig {
  name: string;
  version: string;
  description: string;
  database: {
    path: string;
    source?: string;
    seedFile?: string;
    busyTimeoutMs: number;
  };
  http: {
    port: number;
  };
  policy: {
    allowCte: boolean;
  };
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  name?: string;
  dbPath?: string;
  source?: string;
  seedFile?: string;
  port?: number;
  logLevel?: LogLevel;
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  source: Record<string, string | undefined> = process.env,
): GatewayConfig {
  const rawEnv: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    // Empty variables count as unset
    rawEnv[key] = source[key] || undefined;
  }

  const parsed = envSchema.safeParse(rawEnv);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const env = parsed.data;

  const port = overrides.port ?? env.PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid configuration: port must be an integer between 1 and 65535`);
  }

  return {
    name: overrides.name ?? 'sqlite-gateway-mcp',
    version: '0.1.0',
    description: 'Read-only SQL access to a local SQLite dataset',
    database: {
      path: overrides.dbPath ?? env.DATABASE_PATH,
      source: overrides.source ?? env.DATABASE_URL,
      seedFile: overrides.seedFile ?? env.DATABASE_SEED,
      busyTimeoutMs: env.BUSY_TIMEOUT_MS,
    },
    http: { port },
    policy: { allowCte: env.ALLOW_CTE },
    logLevel: overrides.logLevel ?? env.LOG_LEVEL,
  };
}
