// Environment configuration
// All variables are validated once at startup. An invalid value stops the process.

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LedgerConfig = {
  /** Only needed when a Postgres context is created */
  databaseUrl: string | undefined;
  dbPoolMax: number;
  logLevel: LogLevel;
  nodeEnv: 'development' | 'test' | 'production';
};

/**
 * Configuration could not be loaded. Lists every offending variable.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';
  readonly variables: string[];

  constructor(problems: { variable: string; message: string }[]) {
    super(
      `Invalid environment configuration: ${problems
        .map((p) => `${p.variable} (${p.message})`)
        .join(', ')}`
    );
    this.name = 'ConfigError';
    this.variables = problems.map((p) => p.variable);
  }
}

/**
 * Read configuration from an environment map (process.env by default).
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        variable: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    dbPoolMax: parsed.data.DB_POOL_MAX,
    logLevel: parsed.data.LOG_LEVEL,
    nodeEnv: parsed.data.NODE_ENV,
  };
}

/**
 * The database URL, or a ConfigError when it is not configured.
 */
export function requireDatabaseUrl(config: LedgerConfig): string {
  if (!config.databaseUrl) {
    throw new ConfigError([{ variable: 'DATABASE_URL', message: 'Required' }]);
  }
  return config.databaseUrl;
}
