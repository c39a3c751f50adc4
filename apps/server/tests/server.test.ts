import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { startServer } from '../src/server.js';

describe('startServer', () => {
  it('initializes the schema before accepting requests', async () => {
    const running = await startServer({ dbPath: ':memory:', port: 0, host: '127.0.0.1' });
    try {
      expect(running.port).toBeGreaterThan(0);

      const created = await request(running.server).post('/tasks').send({ title: 'Buy milk' });
      expect(created.status).toBe(201);

      const health = await request(running.server).get('/');
      expect(health.body).toEqual({ message: 'Healthy' });
    } finally {
      await running.close();
    }
  });

  it('rejects when the port is already taken', async () => {
    const first = await startServer({ dbPath: ':memory:', port: 0, host: '127.0.0.1' });
    try {
      await expect(
        startServer({ dbPath: ':memory:', port: first.port, host: '127.0.0.1' }),
      ).rejects.toThrow(/EADDRINUSE/);
    } finally {
      await first.close();
    }
  });
});
