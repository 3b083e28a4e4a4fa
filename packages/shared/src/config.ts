import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { ConfigurationError } from './errors.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));

const configSchema = z
  .object({
    // Storage
    taskStore: z.enum(['postgres', 'memory']).default('postgres'),
    databaseUrl: z.string().url().optional(),

    // Scheduling
    platformPoliciesPath: z.string().min(1).optional(),
    enforceCadence: booleanFlag(false),

    // Worker
    workerPollIntervalMs: z.coerce.number().int().positive().default(60_000),
    dryRun: booleanFlag(true),

    // Dashboard
    dashboardPort: z.coerce.number().int().min(1).max(65_535).default(3000),

    // Logging
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.taskStore === 'postgres' && !cfg.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['databaseUrl'],
        message: 'DATABASE_URL is required when TASK_STORE=postgres',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig) return cachedConfig;

  const result = configSchema.safeParse({
    taskStore: env.TASK_STORE,
    databaseUrl: env.DATABASE_URL,
    platformPoliciesPath: env.PLATFORM_POLICIES_PATH,
    enforceCadence: env.ENFORCE_CADENCE,
    workerPollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
    dryRun: env.DRY_RUN,
    dashboardPort: env.DASHBOARD_PORT,
    logLevel: env.LOG_LEVEL,
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const invalid = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${invalid}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/** Drop the cached config so the next loadConfig() re-reads the environment */
export function resetConfig(): void {
  cachedConfig = null;
}
