import { describe, it, expect, afterEach } from 'vitest';
import http from 'http';
import { startServer } from './index';
import { loadConfig } from './utils/env';

const config = (port = 0) =>
  loadConfig({ NODE_ENV: 'test', OPENAI_API_KEY: 'test-key', HOST: '127.0.0.1', PORT: String(port) });

const close = (server: http.Server) => new Promise<void>((resolve) => server.close(() => resolve()));

describe('startServer', () => {
  const started: http.Server[] = [];

  afterEach(async () => {
    await Promise.all(started.splice(0).map(close));
  });

  it('keeps a single logging error listener once listening', async () => {
    const server = await startServer(config());
    started.push(server);

    expect(server.listening).toBe(true);
    expect(server.listenerCount('error')).toBe(1);
    expect(() => server.emit('error', new Error('socket hang up'))).not.toThrow();
  });

  it('rejects when the port is taken', async () => {
    const first = await startServer(config());
    started.push(first);
    const address = first.address();
    const port = typeof address === 'object' && address ? address.port : 0;

    await expect(startServer(config(port))).rejects.toMatchObject({ code: 'EADDRINUSE' });
  });
});
