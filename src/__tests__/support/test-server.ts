/**
 * In-process HTTP server on an ephemeral loopback port.
 * Requests go through the real express stack; nothing leaves the machine.
 */

import { createServer } from 'http';
import { Express } from 'express';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

export async function startTestServer(app: Express): Promise<TestServer> {
  const server = createServer(app);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close(error => (error ? reject(error) : resolve()));
    }),
  };
}
