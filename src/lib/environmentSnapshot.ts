import { readFile, rm, writeFile } from 'fs/promises';
import type { EnvironmentSnapshot } from '../models';

// NAME="value", value taken raw up to the last quote on the line
const SNAPSHOT_LINE = /^([^=\s]+)="(.*)"$/;

export function formatEnvironmentSnapshot(env: NodeJS.ProcessEnv): string {
  let out = '';
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined) continue;
    out += `${name}="${value}"\n`;
  }
  return out;
}

/**
 * Replaces the snapshot at `path` with the variables in `env`.
 * Nothing from a previous snapshot survives. Values are written unescaped,
 * so a value holding a newline or a quote will not read back intact.
 */
export async function exportEnvironment(env: NodeJS.ProcessEnv, path: string): Promise<void> {
  await rm(path, { force: true });
  await writeFile(path, formatEnvironmentSnapshot(env), 'utf8');
}

export function parseEnvironmentSnapshot(text: string): EnvironmentSnapshot {
  const snapshot: EnvironmentSnapshot = {};
  for (const line of text.split('\n')) {
    const match = SNAPSHOT_LINE.exec(line);
    if (!match) continue;
    snapshot[match[1]] = match[2];
  }
  return snapshot;
}

export async function readEnvironmentSnapshot(path: string): Promise<EnvironmentSnapshot> {
  return parseEnvironmentSnapshot(await readFile(path, 'utf8'));
}
