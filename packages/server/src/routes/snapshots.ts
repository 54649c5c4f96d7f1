import { Hono } from 'hono';
import { errorResponse, type OperationLock, type SandboxFactory } from './sandbox.js';

export function snapshotRoutes(createSandbox: SandboxFactory, lock: OperationLock): Hono {
  const routes = new Hono();

  routes.get('/', async (c) => {
    try {
      return c.json(await createSandbox().listSnapshots());
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.post('/', async (c) => {
    try {
      const record = await lock.run('snapshot', () => createSandbox().snapshot());
      return c.json(record, 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.post('/:id/restore', async (c) => {
    const id = c.req.param('id');
    try {
      const result = await lock.run(`restore ${id}`, () => createSandbox().restore(id));
      return c.json(result);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return routes;
}
