import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server } from 'http';
import { startHealthServer, stopServer } from './health-server.js';

describe('health server', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    server = await startHealthServer('127.0.0.1', 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await stopServer(server);
    vi.restoreAllMocks();
  });

  it('answers GET / with 200', async () => {
    const response = await fetch(`${baseUrl}/`);
    expect(response.status).toBe(200);
    expect(await response.text()).toBe('Server is running');
  });

  it('answers unknown paths with 404', async () => {
    const response = await fetch(`${baseUrl}/status`);
    expect(response.status).toBe(404);
  });
});
