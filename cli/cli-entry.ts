#!/usr/bin/env node
/**
 * Main entry point for the quire CLI application.
 */
import { main } from './index';
import { cliLogger } from '../core/utils/logger';

main(process.argv)
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    cliLogger.error('CLI execution failed', {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exitCode = 1;
  });
