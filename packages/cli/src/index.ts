#!/usr/bin/env node

import { InvalidInputError } from '@holdem-equity/core';
import { parseArgs } from './args.js';
import { printHelp, printVersion, runDecide, runEquity, runEvaluate, runRange } from './commands.js';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  switch (options.command) {
    case 'help':
      printHelp();
      break;

    case 'version':
      printVersion();
      break;

    case 'equity':
      await runEquity(options);
      break;

    case 'range':
      runRange(options);
      break;

    case 'evaluate':
      runEvaluate(options);
      break;

    case 'decide':
      runDecide(options);
      break;
  }
}

main().catch((err: unknown) => {
  if (err instanceof InvalidInputError) {
    console.error('Error:', err.message);
  } else {
    console.error('Error:', err);
  }
  process.exit(1);
});
