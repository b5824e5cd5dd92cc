import path from 'node:path';

import * as dotenv from 'dotenv';

import { runCli } from '@/cli/commands';

for (const file of ['.env.local', '.env']) {
  dotenv.config({ path: path.resolve(process.cwd(), file), override: false });
}

process.exitCode = await runCli(process.argv.slice(2));
