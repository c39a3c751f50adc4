/**
 * chalk-based console output for the server.
 * `LOG_LEVEL=silent` mutes everything (tests), `LOG_LEVEL=error` keeps only errors.
 */

import chalk from 'chalk';

type Level = 'silent' | 'error' | 'info';

function currentLevel(): Level {
  switch (process.env['LOG_LEVEL']?.toLowerCase()) {
    case 'silent': return 'silent';
    case 'error': case 'warn': return 'error';
    default: return 'info';
  }
}

function enabled(level: Exclude<Level, 'silent'>): boolean {
  const current = currentLevel();
  if (current === 'silent') return false;
  return level === 'error' || current === 'info';
}

function timestamp(): string {
  return chalk.dim(new Date().toISOString());
}

// --- Basic output ---

export function success(message: string): void {
  if (enabled('info')) console.log(`${timestamp()} ${chalk.green(message)}`);
}

export function info(message: string): void {
  if (enabled('info')) console.log(`${timestamp()} ${message}`);
}

export function error(message: string, err?: unknown): void {
  if (!enabled('error')) return;
  console.error(`${timestamp()} ${chalk.red(message)}`);
  if (err instanceof Error && err.stack) console.error(chalk.dim(err.stack));
}

// --- Request lines ---

function statusColor(status: number): (s: string) => string {
  if (status >= 500) return chalk.red;
  if (status >= 400) return chalk.yellow;
  if (status >= 300) return chalk.cyan;
  return chalk.green;
}

export function formatRequest(method: string, path: string, status: number, durationMs: number): string {
  return `${chalk.bold(method.padEnd(6))} ${path} ${statusColor(status)(String(status))} ${chalk.dim(`${durationMs.toFixed(1)}ms`)}`;
}

export function request(method: string, path: string, status: number, durationMs: number): void {
  info(formatRequest(method, path, status, durationMs));
}
