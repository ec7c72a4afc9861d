#!/usr/bin/env node
import { main } from './cli';
import { errorMessage } from './lib/errors';

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
