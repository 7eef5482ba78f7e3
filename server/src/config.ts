import { z } from 'zod';

const ConfigSchema = z.object({
  TELEGRAM_TOKEN: z.string().min(1),
  TELEGRAM_API_BASE: z.string().url().default('https://api.telegram.org'),
  TELEGRAM_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  PORT: z.coerce.number().int().min(0).max(65535).default(10000),
  STORE: z.enum(['sqlite', 'memory']).default('sqlite'),
  DATABASE_PATH: z.string().min(1).default('data/ledger.db'),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DEFAULT_USER_LABEL: z.string().min(1).default('yo'),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}
