#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, parsePort, type ConfigOverrides } from './config.js';
import { startServer } from './server.js';
import * as out from './output.js';

const program = new Command()
  .name('todo-server')
  .description('REST backend for the to-do app')
  .version('1.0.0')
  .option('--db <path>', 'SQLite database file (env: SQLITE_DB, default: todo.db)')
  .option('-p, --port <port>', 'port to listen on (env: PORT, default: 3001)', parsePort)
  .option('-H, --host <host>', 'interface to bind (env: HOST, default: 0.0.0.0)')
  .action(async (opts: ConfigOverrides) => {
    const running = await startServer(loadConfig(opts));

    const shutdown = (signal: NodeJS.Signals): void => {
      out.info(`${signal} received, shutting down`);
      running.close().then(
        () => process.exit(0),
        (err: unknown) => {
          out.error('Shutdown failed', err);
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

try {
  await program.parseAsync();
} catch (err: unknown) {
  out.error(err instanceof Error ? err.message : String(err), err);
  process.exit(1);
}
