import { output } from '../cli/output.js';
import type { InitResult, OutputOptions } from '../cli/types.js';
import { getDataDir, initSchema, isInitialized } from '../db/client.js';

/**
 * Initialize casefile and return result data (testable).
 * Missing tables and indexes are created even when the database already exists.
 */
export function doInit(): InitResult {
  const dataDir = getDataDir();
  const alreadyInitialized = isInitialized();

  initSchema();

  return {
    kind: 'init',
    success: true,
    alreadyInitialized,
    dataDir,
    message: alreadyInitialized
      ? 'casefile is already initialized.'
      : 'casefile initialized successfully.',
  };
}

/**
 * CLI runner - outputs to console
 */
export function runInit(options: OutputOptions = {}): void {
  output(doInit(), options);
}
