import { z } from 'zod';

const envSchema = z.object({
  STREAMLOAD_ENDPOINT: z.string().url().default('http://127.0.0.1:8000'),
  STREAMLOAD_STATEMENT_PATH: z.string().startsWith('/').default('/v1/statement'),
  STREAMLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  STREAMLOAD_BATCH_SIZE: z.coerce.number().int().positive().default(100_000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = {
  /** Base URL of the query service. */
  endpoint: string;
  statementPath: string;
  timeoutMs: number;
  /** Batch size used when the command line does not give one. */
  batchSize: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Read and validate settings from the environment. Empty variables count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(`[config] invalid ${key}: ${issue?.message ?? 'unknown error'}`);
  }

  return {
    endpoint: parsed.data.STREAMLOAD_ENDPOINT,
    statementPath: parsed.data.STREAMLOAD_STATEMENT_PATH,
    timeoutMs: parsed.data.STREAMLOAD_TIMEOUT_MS,
    batchSize: parsed.data.STREAMLOAD_BATCH_SIZE,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
