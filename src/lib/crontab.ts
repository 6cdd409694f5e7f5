import cron from 'node-cron';
import { readFile } from 'fs/promises';
import type { ScheduledJob } from '../models';

export class CrontabError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = 'CrontabError';
  }
}

// Five time fields, then the command verbatim
const ENTRY = /^(\S+\s+\S+\s+\S+\s+\S+\s+\S+)(?:\s+(.*))?$/;

/**
 * Parses a job table in the conventional crontab layout:
 * `minute hour day-of-month month day-of-week command`.
 * Blank lines and `#` comments are ignored.
 */
export function parseCrontab(text: string): ScheduledJob[] {
  const jobs: ScheduledJob[] = [];

  text.split('\n').forEach((raw, index) => {
    const lineNo = index + 1;
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const match = ENTRY.exec(line);
    if (!match) {
      throw new CrontabError(`expected five time fields and a command: "${line}"`, lineNo);
    }
    const [, expression, command] = match;
    if (!cron.validate(expression)) {
      throw new CrontabError(`invalid schedule "${expression}"`, lineNo);
    }
    // cron fires when EITHER day field matches; node-cron requires both
    const [, , dayOfMonth, , dayOfWeek] = expression.split(/\s+/);
    if (!dayOfMonth.startsWith('*') && !dayOfWeek.startsWith('*')) {
      throw new CrontabError(
        `"${expression}" restricts both day-of-month and day-of-week; use one of them with the other as *`,
        lineNo,
      );
    }
    if (!command?.trim()) {
      throw new CrontabError('missing command', lineNo);
    }
    jobs.push({ expression: expression.replace(/\s+/g, ' '), command: command.trim(), line: lineNo });
  });

  return jobs;
}

export async function loadCrontab(path: string): Promise<ScheduledJob[]> {
  const jobs = parseCrontab(await readFile(path, 'utf8'));
  if (jobs.length === 0) {
    throw new CrontabError(`no jobs defined in ${path}`);
  }
  return jobs;
}
