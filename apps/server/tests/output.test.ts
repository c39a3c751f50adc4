import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatRequest } from '../src/output.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatRequest', () => {
  it('pads the method and rounds the duration', () => {
    expect(formatRequest('GET', '/tasks', 200, 1.54)).toBe('GET    /tasks 200 1.5ms');
  });

  it('keeps long methods intact', () => {
    expect(formatRequest('DELETE', '/tasks/3', 204, 0.25)).toBe('DELETE /tasks/3 204 0.3ms');
  });
});
