/**
 * Force-stop every profile the local agent reports as running.
 * Exits non-zero when any profile could not be stopped.
 */

import 'dotenv/config';
import { createProfileClient } from '../src/sdk.js';
import { toStructuredError } from '../src/types/errors.js';

async function main(): Promise<void> {
  const client = createProfileClient();
  const { stopped, failed } = await client.profiles.stopAll();

  console.log(`Stopped: ${stopped.length}`);
  for (const id of stopped) {
    console.log(`  ${id}`);
  }
  if (failed.length > 0) {
    console.log(`Failed: ${failed.length}`);
    for (const id of failed) {
      console.log(`  ${id}`);
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Stop-all failed:', JSON.stringify(toStructuredError(error), null, 2));
  process.exitCode = 1;
});
