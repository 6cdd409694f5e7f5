import console from 'console';
import process from 'process';
import { appendFile } from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { CommandRunner, Logger, ScheduledJob } from '../models';
import { readEnvironmentSnapshot } from './environmentSnapshot';
import { runShellCommand } from './shell';

export interface JobSchedulerOptions {
  jobs: ScheduledJob[];
  snapshotPath: string;
  logPath: string;
  timezone?: string;
  // How long stop() waits for running jobs before killing them
  shutdownGraceMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Fires each job on its schedule as a fresh shell process that sees only the
 * environment snapshot, appending the job's output to the log file.
 * Runs of the same job may overlap.
 */
export class JobScheduler {
  private tasks: ScheduledTask[] = [];
  private readonly inFlight = new Set<Promise<number>>();
  private readonly cancel = new AbortController();
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: JobSchedulerOptions) {
    this.runner = options.runner ?? runShellCommand;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.tasks.length > 0;
  }

  get runningJobs(): number {
    return this.inFlight.size;
  }

  start(): void {
    if (this.running) {
      throw new Error('Scheduler is already running');
    }
    const { jobs, timezone } = this.options;
    for (const job of jobs) {
      this.tasks.push(cron.schedule(job.expression, () => this.fire(job), { timezone }));
      this.logger.info(`[Scheduler] Scheduled "${job.command}" at "${job.expression}"`);
    }
    this.logger.info(`[Scheduler] Running ${jobs.length} job(s)`);
  }

  /** Runs one fire of `job` and returns its exit code. */
  async runJob(job: ScheduledJob): Promise<number> {
    const env = await readEnvironmentSnapshot(this.options.snapshotPath);
    const { exitCode, output } = await this.runner(job.command, {
      env,
      capture: true,
      signal: this.cancel.signal,
    });

    const status = `[Scheduler] ${this.now().toISOString()} line ${job.line} exited with code ${exitCode}\n`;
    await appendFile(this.options.logPath, (output ? output + '\n' : '') + status, 'utf8');
    return exitCode;
  }

  async stop(): Promise<void> {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];

    if (this.inFlight.size === 0) return;

    const graceMs = this.options.shutdownGraceMs ?? 10_000;
    this.logger.info(`[Scheduler] Waiting up to ${graceMs}ms for ${this.inFlight.size} running job(s)`);
    const settled = Promise.allSettled([...this.inFlight]);
    const timedOut = await Promise.race([
      settled.then(() => false),
      delay(graceMs, true, { ref: false }),
    ]);

    if (timedOut) {
      this.logger.warn(`[Scheduler] Killing ${this.inFlight.size} job(s) still running after ${graceMs}ms`);
      this.cancel.abort();
      await settled;
    }
  }

  private fire(job: ScheduledJob): void {
    const run: Promise<number> = this.runJob(job)
      .catch((err: unknown) => {
        this.logger.error(`[Scheduler] Job on line ${job.line} could not run:`, err);
        return 1;
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }
}

export interface SignalTarget {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  exit(code?: number): void;
}

export const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGHUP'];

/**
 * Turns the current process into the scheduler daemon: starts the schedule and
 * exits only once a termination signal has stopped it.
 */
export function handOffToScheduler(
  scheduler: JobScheduler,
  { logger = console, target = process }: { logger?: Logger; target?: SignalTarget } = {},
): void {
  scheduler.start();

  let stopping = false;
  for (const signal of TERMINATION_SIGNALS) {
    target.once(signal, () => {
      if (stopping) return;
      stopping = true;
      logger.info(`[Scheduler] Received ${signal}, shutting down`);
      scheduler.stop().then(
        () => target.exit(0),
        (err: unknown) => {
          logger.error('[Scheduler] Shutdown failed:', err);
          target.exit(1);
        },
      );
    });
  }
}
