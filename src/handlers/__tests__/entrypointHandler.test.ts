import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { getEntrypointConfig } from '../../config/entrypoint';
import { JobScheduler } from '../../lib/scheduler';
import type { CommandRunner } from '../../models';
import { runEntrypoint } from '../entrypointHandler';

describe('runEntrypoint', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  let dir: string;
  let snapshotPath: string;
  let crontabPath: string;

  const configFor = (overrides: Record<string, string> = {}) =>
    getEntrypointConfig({
      ENV_SNAPSHOT_PATH: snapshotPath,
      STARTUP_TASK_COMMAND: 'node notify.js',
      CRONTAB_PATH: crontabPath,
      CRON_LOG_PATH: join(dir, 'cron.log'),
      ...overrides,
    });

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'entrypoint-'));
    snapshotPath = join(dir, 'environment');
    crontabPath = join(dir, 'weather.crontab');
    await writeFile(snapshotPath, 'STALE="yes"\n');
    await writeFile(crontabPath, '0 6 * * 1 node notify.js\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('snapshots the environment before the startup run', async () => {
    let snapshotDuringRun = '';
    const runner = vi.fn<CommandRunner>(async () => {
      snapshotDuringRun = await readFile(snapshotPath, 'utf8');
      return { exitCode: 0, output: '' };
    });
    const handOff = vi.fn();

    const result = await runEntrypoint(configFor(), {
      env: { API_KEY: 'abc', CITY: 'Boston' },
      runner,
      logger,
      handOff,
    });

    expect(snapshotDuringRun).toBe('API_KEY="abc"\nCITY="Boston"\n');
    expect(runner).toHaveBeenCalledWith('node notify.js');
    expect(result.state).toBe('scheduling');
    expect(handOff).toHaveBeenCalledTimes(1);
    expect(handOff.mock.calls[0][0]).toBeInstanceOf(JobScheduler);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('still hands off to the scheduler after a failed startup run', async () => {
    const handOff = vi.fn();

    const result = await runEntrypoint(configFor(), {
      env: { CITY: 'Boston' },
      runner: vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 2, output: '' }),
      logger,
      handOff,
    });

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('[Entrypoint] Warning: Startup task exited with code 2');
    expect(result.state).toBe('scheduling');
    expect(handOff).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenLastCalledWith(
      '[Entrypoint] Startup run finished. Starting scheduler...',
    );
  });

  it('never reaches the scheduler under the abort policy', async () => {
    const handOff = vi.fn();

    const result = await runEntrypoint(configFor({ STARTUP_FAILURE_POLICY: 'abort' }), {
      env: { CITY: 'Boston' },
      runner: vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 3, output: '' }),
      logger,
      handOff,
    });

    expect(result).toEqual({ state: 'aborted', exitCode: 3 });
    expect(handOff).not.toHaveBeenCalled();
  });

  it('fails when the job table cannot be loaded', async () => {
    await rm(crontabPath);

    await expect(
      runEntrypoint(configFor(), {
        env: { CITY: 'Boston' },
        runner: vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 0, output: '' }),
        logger,
        handOff: vi.fn(),
      }),
    ).rejects.toThrow(/ENOENT/);
  });

  it('fails before the startup run when the snapshot cannot be written', async () => {
    const runner = vi.fn<CommandRunner>();

    await expect(
      runEntrypoint(configFor({ ENV_SNAPSHOT_PATH: join(dir, 'missing', 'environment') }), {
        env: { CITY: 'Boston' },
        runner,
        logger,
        handOff: vi.fn(),
      }),
    ).rejects.toThrow(/ENOENT/);
    expect(runner).not.toHaveBeenCalled();
  });
});
