#!/usr/bin/env node
/**
 * market-mirror entry point
 */

import { buildProgram } from './cli/program.js';
import { closePool } from './services/database.js';
import { formatErrorForResponse, logError } from './utils/errors.js';

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    logError('cli', error);
    console.error(`\nError: ${formatErrorForResponse(error)}`);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void main();
