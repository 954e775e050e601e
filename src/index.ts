#!/usr/bin/env node
/**
 * OGC Patterns Tester - Main Entry Point
 *
 * Deploys CWL application package patterns to an OGC API - Processes
 * server, executes them, monitors the jobs and cleans up afterwards.
 *
 * Usage:
 *   npm start -- run pattern-1
 *   npm start -- run-all --continue-on-error
 *   npm start -- sync-params --all
 */

import { logger } from './config/logger.js';
import { runCli } from './cli/index.js';
import { errorMessage } from './errors.js';

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  process.exit(1);
});

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Failed to start', { error: errorMessage(error) });
    process.exit(1);
  });
