import { beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../server.js';
import { LifecycleOrchestrator } from '../services/orchestrator.js';
import { OperationLock } from './sandbox.js';
import { FakeHost } from '../test/fakes/fake-host.js';
import { FakeControlPlane } from '../test/fakes/fake-control-plane.js';
import { TEST_CONFIG, addVmImages } from '../test/fakes/fixtures.js';

function post(body?: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

describe('sandbox API', () => {
  let host: FakeHost;
  let lock: OperationLock;
  let created: LifecycleOrchestrator[];
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    host = new FakeHost();
    addVmImages(host);
    lock = new OperationLock();
    created = [];
    const controlPlane = new FakeControlPlane(host);
    app = createApp(TEST_CONFIG, () => {
      const sandbox = LifecycleOrchestrator.create(TEST_CONFIG, host, controlPlane);
      created.push(sandbox);
      return sandbox;
    }, lock);
  });

  it('answers the health check', async () => {
    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', dryRun: false, busy: false });
  });

  it('sets up a detached sandbox', async () => {
    const res = await app.request('/api/sandbox/setup', post({}));

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      network: { device: 'tap0', uplink: 'eth0' },
      vm: { pid: 4100, session: 'firecracker' },
    });
  });

  it('validates the setup body', async () => {
    const res = await app.request('/api/sandbox/setup', post({ bootConfig: '' }));

    expect(res.status).toBe(400);
  });

  it('reports status after setup', async () => {
    await app.request('/api/sandbox/setup', post({}));

    const res = await app.request('/api/sandbox/status');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ vm: { running: true, pid: 4100 }, network: { deviceExists: true } });
  });

  it('tears down', async () => {
    await app.request('/api/sandbox/setup', post({}));

    const res = await app.request('/api/sandbox/teardown', post());

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true });
    expect(host.state().processes).toEqual([]);
  });

  it('maps a configuration error to 400', async () => {
    const res = await app.request('/api/snapshots/20990101-000000/restore', post());

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Snapshot '20990101-000000' not found in snapshots. Available snapshots: (none)",
      kind: 'configuration',
    });
  });

  it('takes and lists snapshots', async () => {
    await app.request('/api/sandbox/setup', post({}));

    const created = await app.request('/api/snapshots', post());
    const list = await app.request('/api/snapshots');

    expect(created.status).toBe(201);
    const record: unknown = await created.json();
    expect(record).toMatchObject({ sourcePid: 4100 });
    const snapshots: unknown = await list.json();
    expect(snapshots).toHaveLength(1);
  });

  it('keeps no command history between requests', async () => {
    await app.request('/api/sandbox/setup', post({}));
    const setupHistory = created[0].history;

    await app.request('/api/sandbox/teardown', post());

    expect(created).toHaveLength(2);
    expect(created[0].history).toEqual(setupHistory);
    expect(created[1].history).toContain('kill -TERM 4100');
    expect(created[1].history).not.toContain('mkfifo /tmp/firecracker.socket');
  });

  it('rejects an operation while another one runs', async () => {
    let release = (): void => undefined;
    const running = lock.run('setup', () => new Promise<void>((resolve) => {
      release = () => resolve();
    }));

    const res = await app.request('/api/sandbox/teardown', post());

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: 'Another sandbox operation is in progress: setup', kind: 'busy' });

    release();
    await running;
    expect(lock.busy).toBe(false);
  });
});
