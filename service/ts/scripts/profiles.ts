#!/usr/bin/env tsx
import 'dotenv/config';
import { hideBin } from 'yargs/helpers';

import { createProfilesCli } from '../src/cli/profiles.js';
import { closePool } from '../src/db/client.js';

async function main() {
  await createProfilesCli(hideBin(process.argv)).parseAsync();
}

main()
  .catch((err) => {
    console.error('profiles_cli_failed', err);
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool().catch((err) => console.warn('pool_close_failed', err));
  });
