import process from 'process';
import { execa } from 'execa';
import type { CommandOptions, CommandResult } from '../models';

// After SIGTERM, the process group gets this long before SIGKILL
export const KILL_GRACE_MS = 2000;

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

/**
 * Runs `command` through /bin/sh, the way cron runs a crontab entry.
 * Never rejects on a non-zero exit: the code is returned instead. A child that
 * could not be started or was killed by a signal reports 1.
 *
 * When `signal` is given the shell leads its own process group, and aborting
 * kills the whole group so that commands the shell forked die with it.
 */
export async function runShellCommand(
  command: string,
  { env, capture = false, signal }: CommandOptions = {},
): Promise<CommandResult> {
  const subprocess = execa(command, {
    shell: true,
    env,
    // With an explicit env the child sees exactly that, as a sourced cron job would
    extendEnv: env === undefined,
    reject: false,
    stdio: capture ? 'pipe' : 'inherit',
    all: capture,
    detached: signal !== undefined,
  });

  const killGroup = (killSignal: NodeJS.Signals) => {
    const { pid } = subprocess;
    if (pid === undefined) return;
    try {
      process.kill(-pid, killSignal);
    } catch (err) {
      // Group already gone; anything else, fall back to the shell alone
      if (!isMissingProcess(err)) subprocess.kill(killSignal);
    }
  };

  let forceKill: NodeJS.Timeout | undefined;
  const onAbort = () => {
    killGroup('SIGTERM');
    forceKill = setTimeout(() => killGroup('SIGKILL'), KILL_GRACE_MS);
    forceKill.unref();
  };

  if (signal?.aborted) onAbort();
  else signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const result = await subprocess;
    return {
      exitCode: result.exitCode ?? 1,
      output: typeof result.all === 'string' ? result.all : '',
    };
  } finally {
    signal?.removeEventListener('abort', onAbort);
    clearTimeout(forceKill);
  }
}
