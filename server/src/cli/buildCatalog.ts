#!/usr/bin/env node
import { errorMessage, logError, logInfo } from '../observability/logger';
import { rebuildAndSave } from '../services/catalogService';
import { parseArgs } from './args';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const payload = await rebuildAndSave(options);
  logInfo('catalog_cli_done', {
    databaseDir: options.databaseDir,
    bodies: payload.bodies.length,
    bootstrap: payload.metadata.summary?.bootstrap
  });
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logError('catalog_cli_failed', { error: errorMessage(err) });
    process.exitCode = 1;
  });
}
