import { z } from 'zod';

// =================================================================================
// Environment Configuration
// =================================================================================

const booleanFlag = (fallback: boolean) =>
  z.string().optional().transform((val) => (val === undefined ? fallback : val === 'true'));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const ConfigSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  HOST: z.string().default('0.0.0.0'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  STRUCTURED_LOGGING: booleanFlag(false),
  ENABLE_QUERY_LOGGING: booleanFlag(false),

  DB_MAX_CONNECTIONS: positiveInt(10),
  DB_CONNECTION_TIMEOUT_MS: positiveInt(10_000),
  DB_IDLE_TIMEOUT_MS: positiveInt(30_000),

  DEFAULT_PAGE_SIZE: positiveInt(15),

  CORS_ORIGINS: z.string().default('*').transform((val) =>
    val.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0)
  ),

  RUN_MIGRATIONS: booleanFlag(true),
  MIGRATIONS_DIR: z.string().default('migrations'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      'Invalid configuration:\n' +
        issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n')
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse configuration from environment variables.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const result = ConfigSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}
