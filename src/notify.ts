// Runs the weekly forecast notification once; used by the startup run and every scheduled fire.
import 'dotenv/config';
import console from 'console';
import process from 'process';
import { handler } from './handlers/weatherHandler';

async function main() {
  const { status } = await handler();
  process.exitCode = status === 200 ? 0 : 1;
}

main().catch((err) => {
  console.error('Weather notification failed:', err);
  process.exit(1);
});
