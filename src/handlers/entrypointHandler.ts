import console from 'console';
import process from 'process';
import type { EntrypointConfig } from '../config/entrypoint';
import { loadCrontab } from '../lib/crontab';
import { exportEnvironment } from '../lib/environmentSnapshot';
import { JobScheduler, handOffToScheduler } from '../lib/scheduler';
import { runShellCommand } from '../lib/shell';
import { runStartupTask } from '../lib/startupRunner';
import type { CommandRunner, Logger } from '../models';

export interface EntrypointDeps {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  logger?: Logger;
  handOff?: (scheduler: JobScheduler) => void;
}

export type EntrypointResult =
  | { state: 'scheduling'; scheduler: JobScheduler }
  | { state: 'aborted'; exitCode: number };

/**
 * Container start sequence: snapshot the environment, run the task once,
 * then hand the process over to the scheduler. Only the startup failure
 * policy can stop it short of the handoff.
 */
export async function runEntrypoint(
  config: EntrypointConfig,
  deps: EntrypointDeps = {},
): Promise<EntrypointResult> {
  const {
    env = process.env,
    runner = runShellCommand,
    logger = console,
    handOff = (scheduler: JobScheduler) => handOffToScheduler(scheduler, { logger }),
  } = deps;

  logger.info('[Entrypoint] Setting up environment for scheduled runs...');
  await exportEnvironment(env, config.ENV_SNAPSHOT_PATH);

  const outcome = await runStartupTask(config.STARTUP_TASK_COMMAND, {
    policy: config.STARTUP_FAILURE_POLICY,
    runner,
    logger,
  });
  if (!outcome.proceed) {
    return { state: 'aborted', exitCode: outcome.exitCode };
  }

  logger.info('[Entrypoint] Startup run finished. Starting scheduler...');
  const jobs = await loadCrontab(config.CRONTAB_PATH);
  const scheduler = new JobScheduler({
    jobs,
    snapshotPath: config.ENV_SNAPSHOT_PATH,
    logPath: config.CRON_LOG_PATH,
    timezone: config.CRON_TIMEZONE,
    shutdownGraceMs: config.SHUTDOWN_GRACE_MS,
    runner,
    logger,
  });
  handOff(scheduler);

  return { state: 'scheduling', scheduler };
}
