#!/usr/bin/env node

import { createRequire } from 'node:module';
import { InvalidArgumentError, program } from 'commander';
import { runAdd } from './commands/add.js';
import { runInit } from './commands/init.js';
import { runList } from './commands/list.js';
import { runRemove } from './commands/remove.js';
import { runSearch } from './commands/search.js';
import { runServe } from './commands/serve.js';
import { runStats } from './commands/stats.js';
import { closeStore, getStore, initSchema, isInitialized } from './db/client.js';
import { logDebug, logError } from './logger.js';

const pkg: unknown = createRequire(import.meta.url)('../package.json');
const VERSION =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0-dev';

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

program
  .name('casefile')
  .description('Local notebook for open-source investigations')
  .version(VERSION)
  .option('-j, --json', 'Output as JSON (applies to all commands)');

program
  .command('init')
  .description('Initialize the casefile database')
  .action(() => {
    const globalOpts = program.opts();
    runInit({ json: globalOpts.json });
  });

program
  .command('serve')
  .description('Start the dashboard and JSON API')
  .option('-p, --port <number>', 'Port to listen on (default: CASEFILE_PORT or 8000)', parseInteger)
  .option('--host <host>', 'Interface to bind', '127.0.0.1')
  .action(async (options) => {
    ensureInitialized();
    await runServe({ port: options.port, host: options.host });
  });

program
  .command('search <name>')
  .description('Generate search URLs for a name')
  .option('--fa <name>', 'Localized (Persian) spelling of the name')
  .action((name, options) => {
    const globalOpts = program.opts();
    runSearch(name, { ...options, json: globalOpts.json });
  });

program
  .command('add <name>')
  .description('Add an investigation subject')
  .option('--fa <name>', 'Localized (Persian) spelling of the name')
  .option('-l, --location <location>', 'Where the subject was spotted')
  .option('-e, --event <event>', 'Event description')
  .option('--notes <notes>', 'Notes about this subject')
  .action((name, options) => {
    logDebug('cli', 'add', { name });
    ensureInitialized();
    const globalOpts = program.opts();
    runAdd(getStore(), name, { ...options, json: globalOpts.json });
  });

program
  .command('list')
  .description('List investigation subjects')
  .option('-s, --status <status>', 'Filter by status (New, Investigating, Verified)')
  .option('-r, --risk <level>', 'Filter by risk level (Unknown, Low, Medium, High, Critical)')
  .action((options) => {
    ensureInitialized();
    const globalOpts = program.opts();
    runList(getStore(), { ...options, json: globalOpts.json });
  });

program
  .command('remove <id>')
  .description('Delete a subject by id')
  .action((id) => {
    ensureInitialized();
    const globalOpts = program.opts();
    runRemove(getStore(), parseInteger(id), { json: globalOpts.json });
  });

program
  .command('stats')
  .description('Show subject statistics')
  .action(() => {
    ensureInitialized();
    const globalOpts = program.opts();
    runStats(getStore(), { json: globalOpts.json });
  });

function ensureInitialized(): void {
  if (!isInitialized()) {
    console.log('casefile is not initialized. Initializing now...');
    initSchema();
    console.log('');
  }
}

program
  .parseAsync()
  .then(() => {
    closeStore();
    process.exit(0);
  })
  .catch((err: unknown) => {
    logError('cli', err instanceof Error ? err.message : String(err));
    closeStore();
    process.exit(1);
  });
