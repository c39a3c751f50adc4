import type { Server } from 'node:http';
import type { Express } from 'express';
import { createDb, initSchema, closeDb } from '@todo/core';
import { createApp } from './app.js';
import type { ServerConfig } from './config.js';
import * as out from './output.js';

export interface RunningServer {
  readonly server: Server;
  /** Port actually bound (differs from the config when it asked for 0) */
  readonly port: number;
  close(): Promise<void>;
}

function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}

/**
 * Open the database, create the schema if needed, then start accepting requests.
 */
export async function startServer(config: ServerConfig): Promise<RunningServer> {
  const db = createDb(config.dbPath);
  initSchema(db);
  out.info(`Database ready at ${config.dbPath}`);

  let server: Server;
  try {
    server = await listen(createApp(db), config.port, config.host);
  } catch (err: unknown) {
    closeDb(db);
    throw err;
  }

  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : config.port;
  out.success(`Listening on http://${config.host}:${port}`);

  return {
    server,
    port,
    async close() {
      try {
        await closeServer(server);
      } finally {
        closeDb(db);
        out.info('Server stopped');
      }
    },
  };
}
