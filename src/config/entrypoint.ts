import process from 'process';
import { z } from 'zod';
import { parseEnv } from './validate';

export const STARTUP_FAILURE_POLICIES = ['continue', 'abort'] as const;
export type StartupFailurePolicy = (typeof STARTUP_FAILURE_POLICIES)[number];

function isTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const entrypointSchema = z.object({
  // Snapshot of the container environment, sourced by every scheduled run
  ENV_SNAPSHOT_PATH: z.string().min(1).default('/etc/environment'),
  STARTUP_TASK_COMMAND: z.string().min(1).default('node --import tsx src/notify.ts'),
  // What to do when the startup run exits non-zero
  STARTUP_FAILURE_POLICY: z.enum(STARTUP_FAILURE_POLICIES).default('continue'),
  CRONTAB_PATH: z.string().min(1).default('config/weather.crontab'),
  CRON_LOG_PATH: z.string().min(1).default('/var/log/cron.log'),
  CRON_TIMEZONE: z
    .string()
    .min(1)
    .refine(isTimeZone, 'CRON_TIMEZONE must be an IANA time zone')
    .optional(),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(10_000),
});

export type EntrypointConfig = z.infer<typeof entrypointSchema>;

export function getEntrypointConfig(env: NodeJS.ProcessEnv = process.env): EntrypointConfig {
  return parseEnv(entrypointSchema, env, 'entrypoint');
}
