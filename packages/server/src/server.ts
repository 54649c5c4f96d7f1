import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { OperationLock, sandboxRoutes, type SandboxFactory } from './routes/sandbox.js';
import { snapshotRoutes } from './routes/snapshots.js';
import type { SandboxConfig } from './types/sandbox.js';
import { createLogger } from './utils/logger.js';
import { findAvailablePort } from './utils/port.js';

const log = createLogger('Server');

const HOST = '127.0.0.1';

export function createApp(config: SandboxConfig, createSandbox: SandboxFactory, lock = new OperationLock()): Hono {
  const app = new Hono();

  app.use('*', logger());

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      dryRun: config.dryRun,
      busy: lock.busy,
    });
  });

  app.route('/api/sandbox', sandboxRoutes(createSandbox, lock));
  app.route('/api/snapshots', snapshotRoutes(createSandbox, lock));

  return app;
}

/**
 * Serve the API on localhost, starting at the configured port and moving up
 * when it is taken
 */
export async function startServer(config: SandboxConfig, createSandbox: SandboxFactory): Promise<void> {
  const port = await findAvailablePort(config.serverPort, HOST);
  const app = createApp(config, createSandbox);

  serve({ fetch: app.fetch, port, hostname: HOST }, (info) => {
    log.info(`Sandbox API running on http://${HOST}:${info.port}`);
    log.info(`Health check: http://${HOST}:${info.port}/api/health`);
    if (config.dryRun) {
      log.warn('Dry run: requests are traced, the host is not changed');
    }
  });
}
