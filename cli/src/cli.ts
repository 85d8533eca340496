#!/usr/bin/env tsx
/**
 * Capflow CLI
 *
 * Usage:
 *   capflow run [flow]          Run a flow (built-in conversation flow by default)
 *   capflow validate <flow>     Check a flow without running it
 *   capflow capabilities        List registered capabilities
 */

import { ExitCodes, toError } from '@capflow/engine';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const err = toError(error);
  console.error('Fatal error:', err.message);
  if (process.env.DEBUG) {
    console.error(err.stack);
  }
  process.exit(ExitCodes.INTERNAL_ERROR);
});
