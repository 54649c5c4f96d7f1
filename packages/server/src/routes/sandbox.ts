import { Hono, type Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { LifecycleOrchestrator } from '../services/orchestrator.js';
import { SandboxBusyError, SandboxError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Sandbox API');

const SetupSchema = z.object({
  bootConfig: z.string().min(1).optional(),
});

/**
 * One sandbox operation at a time; a second caller gets 409 instead of
 * waiting behind a start poll.
 */
export class OperationLock {
  private current: string | null = null;

  get busy(): boolean {
    return this.current !== null;
  }

  async run<T>(name: string, fn: () => Promise<T>): Promise<T> {
    if (this.current !== null) {
      throw new SandboxBusyError(this.current);
    }
    this.current = name;
    try {
      return await fn();
    } finally {
      this.current = null;
    }
  }
}

/**
 * Builds the orchestrator for one request, so no command history outlives it
 */
export type SandboxFactory = () => LifecycleOrchestrator;

export function errorResponse(c: Context, error: unknown) {
  if (error instanceof SandboxError) {
    const status = error.kind === 'configuration' ? 400 : error.kind === 'busy' ? 409 : 500;
    if (status === 500) log.error(error.message);
    return c.json({ error: error.message, kind: error.kind }, status);
  }
  log.error(`Unexpected failure: ${describeError(error)}`);
  return c.json({ error: describeError(error), kind: 'internal' }, 500);
}

export function sandboxRoutes(createSandbox: SandboxFactory, lock: OperationLock): Hono {
  const routes = new Hono();

  // VM and network status
  routes.get('/status', async (c) => {
    try {
      return c.json(await createSandbox().status());
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.get('/network', async (c) => {
    try {
      return c.json(await createSandbox().netInfo());
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.get('/vms', async (c) => {
    try {
      return c.json(await createSandbox().listVms());
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Always detached: there is no terminal to run a foreground VM in
  routes.post('/setup', zValidator('json', SetupSchema), async (c) => {
    const { bootConfig } = c.req.valid('json');
    try {
      const result = await lock.run('setup', () => createSandbox().setup({ detached: true, bootConfigPath: bootConfig }));
      return c.json(result, 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.post('/teardown', async (c) => {
    try {
      await lock.run('teardown', () => createSandbox().teardown());
      return c.json({ success: true });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return routes;
}
