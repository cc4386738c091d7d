#!/usr/bin/env node
import { processIo, runCookieCli } from '../lib/cli/cookie-cli';
import { describeError, installGlobalErrorHooks } from '../lib/log/bootstrap-errors';
import { appLogger } from '../lib/log/logger';

async function main() {
  installGlobalErrorHooks('cli');
  const exitCode = await runCookieCli(process.argv.slice(2), { io: processIo });
  await appLogger.flush();
  process.exit(exitCode);
}

main().catch(async (error: unknown) => {
  const { message, stack } = describeError(error);
  console.error(message);
  appLogger.error('cli_crash', message, { channel: 'cli', stack });
  await appLogger.flush();
  process.exit(1);
});
