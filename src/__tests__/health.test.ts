/**
 * =============================================================================
 * HEALTH ROUTES - Tests
 * =============================================================================
 */

import express from 'express';
import { createHealthRouter } from '../shared/routes/health.routes';
import { GenerationOptions, TextGenerator } from '../shared/services/gemini.service';
import { startTestServer, TestServer } from './support/test-server';

class StubGenerator implements TextGenerator {
  constructor(private readonly available: boolean) {}

  isAvailable(): boolean {
    return this.available;
  }

  async generate(_prompt: string, _options: GenerationOptions): Promise<string> {
    return 'ok';
  }
}

async function withHealthServer(available: boolean, run: (server: TestServer) => Promise<void>): Promise<void> {
  const app = express();
  app.use(createHealthRouter(new StubGenerator(available)));
  const server = await startTestServer(app);
  try {
    await run(server);
  } finally {
    await server.close();
  }
}

describe('Health routes', () => {
  it('GET /health reports healthy', async () => {
    await withHealthServer(true, async server => {
      const response = await fetch(`${server.baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'healthy' });
    });
  });

  it('GET /health/live reports the process id', async () => {
    await withHealthServer(true, async server => {
      const response = await fetch(`${server.baseUrl}/health/live`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'alive', pid: process.pid });
    });
  });

  it('GET /health/ready is ready with a text generator', async () => {
    await withHealthServer(true, async server => {
      const response = await fetch(`${server.baseUrl}/health/ready`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'ready', checks: { textGeneration: true } });
    });
  });

  it('GET /health/ready is not ready without one', async () => {
    await withHealthServer(false, async server => {
      const response = await fetch(`${server.baseUrl}/health/ready`);

      expect(response.status).toBe(503);
      expect(await response.json()).toMatchObject({ status: 'not_ready', checks: { textGeneration: false } });
    });
  });
});
