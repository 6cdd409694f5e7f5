// Container entrypoint. Start with `node --import tsx src/entrypoint.ts` so this
// process, not a wrapper, becomes the scheduler and receives container signals.
import console from 'console';
import process from 'process';
import { getEntrypointConfig } from './config/entrypoint';
import { runEntrypoint } from './handlers/entrypointHandler';

async function main() {
  const config = getEntrypointConfig();
  const result = await runEntrypoint(config);
  if (result.state === 'aborted') {
    process.exit(result.exitCode);
  }
}

main().catch((err) => {
  console.error('[Entrypoint] Fatal:', err);
  process.exit(1);
});
