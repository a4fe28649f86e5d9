#!/usr/bin/env node
/**
 * Litter Sweep Planner - CLI Interface
 */

import { ConfigurationError } from '../domain/errors.js';
import { parseArgs, runCommand } from './commands.js';

// Main entry point
function main(): void {
  try {
    const options = parseArgs(process.argv.slice(2));
    process.exitCode = runCommand(options);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    console.error('Error:', err);
    process.exitCode = 1;
  }
}

main();
