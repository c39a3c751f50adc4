import { InvalidArgumentError } from 'commander';
import { DEFAULT_DB_PATH } from '@todo/core';

export const DEFAULT_PORT = 3001;
export const DEFAULT_HOST = '0.0.0.0';

export interface ServerConfig {
  /** SQLite file, or ':memory:' */
  dbPath: string;
  port: number;
  host: string;
}

/** Values given on the command line; they win over the environment */
export interface ConfigOverrides {
  db?: string;
  port?: number;
  host?: string;
}

/** Parse a TCP port; also used as a commander option parser */
export function parsePort(value: string): number {
  const port = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port "${value}", expected an integer between 0 and 65535.`);
  }
  return port;
}

/**
 * Resolve the configuration once at startup.
 * Precedence: command line > environment (SQLITE_DB, PORT, HOST) > defaults.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const envPort = env['PORT'];
  return {
    dbPath: overrides.db ?? env['SQLITE_DB'] ?? DEFAULT_DB_PATH,
    port: overrides.port ?? (envPort ? parsePort(envPort) : DEFAULT_PORT),
    host: overrides.host ?? env['HOST'] ?? DEFAULT_HOST,
  };
}
