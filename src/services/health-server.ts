import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../utils/logger.js';

/**
 * Liveness endpoint for hosts that expect an open port: GET / answers
 * "Server is running", everything else is 404.
 */
export function createHealthServer(): Server {
  return createServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);

    if (url.pathname === '/' && (req.method === 'GET' || req.method === 'HEAD')) {
      res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end('Server is running');
      return;
    }

    res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end('Not Found');
  });
}

export function startHealthServer(host: string, port: number): Promise<Server> {
  const server = createHealthServer();

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      logger.info(`Health check listening on http://${host}:${port}/`);
      resolve(server);
    });
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
