import { beforeEach, describe, expect, it } from 'vitest';
import { ControlSocketResource } from './control-socket.js';
import { FakeHost } from '../test/fakes/fake-host.js';
import { createRunner } from '../test/fakes/fixtures.js';

const SOCKET = '/tmp/firecracker.socket';

describe('ControlSocketResource', () => {
  let host: FakeHost;
  let socket: ControlSocketResource;

  beforeEach(() => {
    host = new FakeHost();
    socket = new ControlSocketResource(createRunner(host));
  });

  it('creates the endpoint with owner and group access', async () => {
    await socket.activate(SOCKET);

    expect(host.state().files[SOCKET]).toEqual({ type: 'fifo', mode: '660' });
    expect(await socket.isActive(SOCKET)).toBe(true);
  });

  it('replaces a stale file at the path', async () => {
    host.addFile(SOCKET, 'leftover');

    await socket.activate(SOCKET);

    expect(host.commands).toEqual([`rm -f ${SOCKET}`, `mkfifo ${SOCKET}`, `chmod 660 ${SOCKET}`]);
    expect(host.state().files[SOCKET]).toEqual({ type: 'fifo', mode: '660' });
  });

  it('uses the configured mode', async () => {
    socket = new ControlSocketResource(createRunner(host), '600');

    await socket.activate(SOCKET);

    expect(host.state().files[SOCKET].mode).toBe('600');
  });

  it('deactivates whether or not the endpoint exists', async () => {
    await socket.deactivate(SOCKET);
    await socket.activate(SOCKET);
    await socket.deactivate(SOCKET);

    expect(await socket.isActive(SOCKET)).toBe(false);
  });
});
