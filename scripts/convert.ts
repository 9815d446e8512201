#!/usr/bin/env node
import { runConvertCli } from './lib/cli/convert_cli.js';
import { formatError } from './lib/errors.js';

runConvertCli().catch((error) => {
  console.error(formatError(error));
  process.exit(1);
});
