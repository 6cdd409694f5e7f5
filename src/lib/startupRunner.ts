import console from 'console';
import type { StartupFailurePolicy } from '../config/entrypoint';
import type { CommandRunner, Logger } from '../models';
import { runShellCommand } from './shell';

export interface StartupRunOptions {
  policy: StartupFailurePolicy;
  runner?: CommandRunner;
  logger?: Logger;
}

export interface StartupOutcome {
  exitCode: number;
  // Whether the entrypoint goes on to start the scheduler
  proceed: boolean;
}

const onFailure: Record<StartupFailurePolicy, (exitCode: number, logger: Logger) => boolean> = {
  continue: () => true,
  abort: (exitCode, logger) => {
    logger.error(`[Entrypoint] Startup failure policy is "abort"; exiting with code ${exitCode}`);
    return false;
  },
};

export async function runStartupTask(
  command: string,
  { policy, runner = runShellCommand, logger = console }: StartupRunOptions,
): Promise<StartupOutcome> {
  logger.info('[Entrypoint] Executing notification task on startup...');
  // Output goes straight to the container's stdout/stderr
  const { exitCode } = await runner(command);

  if (exitCode === 0) {
    return { exitCode, proceed: true };
  }

  logger.warn(`[Entrypoint] Warning: Startup task exited with code ${exitCode}`);
  return { exitCode, proceed: onFailure[policy](exitCode, logger) };
}
