/**
 * Control Service Diagnostics
 *
 * Reports whether the local agent and the cloud API answer and which CDP
 * ports are live. Exit code: 0 ready, 1 local-only, 2 unavailable.
 */

import 'dotenv/config';
import { createProfileClient } from '../src/sdk.js';
import type { ServiceDiagnosis, ServiceVerdict } from '../src/core/service-diagnostics.js';
import { toStructuredError } from '../src/types/errors.js';

const EXIT_CODES: Record<ServiceVerdict, number> = {
  ready: 0,
  'local-only': 1,
  unavailable: 2,
};

const ADVICE: Record<ServiceVerdict, string> = {
  ready: 'Profiles can be created and started.',
  'local-only': 'The local agent answers but the cloud API does not. Check PROFILE_API_TOKEN.',
  unavailable: 'The local agent does not answer. Start it and check PROFILE_API_LOCAL_URL.',
};

function printReport(diagnosis: ServiceDiagnosis, localUrl: string, cloudUrl: string): void {
  console.log('=== Control Service Diagnostics ===\n');
  console.log(`Local agent: ${localUrl}`);
  console.log(`Cloud API:   ${cloudUrl}\n`);

  for (const check of diagnosis.checks) {
    const mark = check.ok ? 'OK  ' : 'FAIL';
    const status = check.status === undefined ? '' : ` (${check.status})`;
    console.log(`  [${mark}] ${check.base} GET ${check.path}${status}`);
    if (check.error) {
      console.log(`         ${check.error}`);
    }
  }

  console.log('');
  console.log(
    diagnosis.livePorts.length > 0
      ? `Live CDP ports: ${diagnosis.livePorts.join(', ')}`
      : 'Live CDP ports: none'
  );
  console.log(`\nVerdict: ${diagnosis.verdict}`);
  console.log(ADVICE[diagnosis.verdict]);
}

async function main(): Promise<void> {
  const client = createProfileClient();
  const diagnosis = await client.diagnose();
  printReport(diagnosis, client.transport.baseUrl('local'), client.transport.baseUrl('cloud'));
  process.exitCode = EXIT_CODES[diagnosis.verdict];
}

main().catch((error) => {
  console.error('Diagnostics failed:', JSON.stringify(toStructuredError(error), null, 2));
  process.exitCode = 2;
});
