import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { SCHEMA_SQL } from './schema.js';
import { openStore, type Store } from './store.js';

// Configuration - can be set explicitly or via env
let configuredDataDir: string | null = null;

function getEffectiveDataDir(): string {
  return configuredDataDir || process.env.CASEFILE_DATA_DIR || join(homedir(), '.casefile');
}

function getEffectiveDbPath(): string {
  return join(getEffectiveDataDir(), 'casefile.db');
}

// The CLI process owns one store; the server and managers receive it explicitly.
let store: Store | null = null;

/**
 * Configure the data directory explicitly.
 * Call this before the store is opened if you need a custom location.
 */
export function setDataDir(dataDir: string): void {
  if (store) {
    throw new Error(
      'Cannot change data directory after the store is open. Call closeStore() first.'
    );
  }
  configuredDataDir = dataDir;
}

export function getDataDir(): string {
  return getEffectiveDataDir();
}

export function getDbPath(): string {
  return getEffectiveDbPath();
}

export function isInitialized(): boolean {
  return existsSync(getEffectiveDbPath());
}

export function getStore(): Store {
  if (!store) {
    store = openStore(getEffectiveDbPath());
  }
  return store;
}

/**
 * Create any missing tables and indexes. Safe to call repeatedly.
 */
export function initSchema(): void {
  getStore().exec(SCHEMA_SQL);
}

export function closeStore(): void {
  if (store) {
    store.close();
    store = null;
  }
}

/**
 * For testing - close the store and forget any explicit data directory
 */
export function resetCache(): void {
  closeStore();
  configuredDataDir = null;
}
