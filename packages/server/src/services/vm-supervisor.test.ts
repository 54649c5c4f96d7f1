import { beforeEach, describe, expect, it } from 'vitest';
import { VmProcessSupervisor } from './vm-supervisor.js';
import { AttachError, ConfigurationError, ControlPlaneFailure, ProcessStartFailure } from '../utils/errors.js';
import { FakeHost } from '../test/fakes/fake-host.js';
import { FakeControlPlane } from '../test/fakes/fake-control-plane.js';
import { SUPERVISOR_OPTIONS, VM_COMMAND, addVmImages, createRunner } from '../test/fakes/fixtures.js';

const SOCKET = '/tmp/firecracker.socket';
const START = { bootConfigPath: 'vm-config.json', socketPath: SOCKET, detached: true };

describe('VmProcessSupervisor', () => {
  let host: FakeHost;
  let controlPlane: FakeControlPlane;
  let supervisor: VmProcessSupervisor;

  beforeEach(() => {
    host = new FakeHost();
    addVmImages(host);
    controlPlane = new FakeControlPlane(host);
    supervisor = new VmProcessSupervisor(createRunner(host), controlPlane, SUPERVISOR_OPTIONS);
  });

  describe('start', () => {
    it('launches a detached VM in a tmux session and returns its pid', async () => {
      const handle = await supervisor.start(START);

      expect(handle).toEqual({
        pid: 4100,
        bootConfigPath: 'vm-config.json',
        socketPath: SOCKET,
        logPath: '/tmp/firecracker-console.log',
        session: 'firecracker',
      });
      expect(host.commands).toContain(
        `tmux new-session -d -s firecracker '${VM_COMMAND} 2>&1 | tee -a /tmp/firecracker-console.log'`
      );
      expect(host.state().processes).toEqual([{ pid: 4100, command: VM_COMMAND }]);
      expect(host.state().sessions).toEqual(['firecracker']);
    });

    it('reports the console output when the VM does not come up', async () => {
      host.spawnFails = true;
      host.startupOutput = 'Error: KVM is not available\n';

      const error = await supervisor.start(START).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProcessStartFailure);
      expect(error).toHaveProperty('output', 'Error: KVM is not available');
      expect(error).toHaveProperty('message', 'Firecracker failed to start within 50ms\nError: KVM is not available');
    });

    it('returns the running VM instead of starting a second one', async () => {
      const pid = host.addProcess(VM_COMMAND);

      const handle = await supervisor.start(START);

      expect(handle?.pid).toBe(pid);
      expect(host.commands.some((c) => c.startsWith('tmux new-session'))).toBe(false);
    });

    it('rejects a missing boot config before launching anything', async () => {
      const error = await supervisor
        .start({ ...START, bootConfigPath: 'missing.json' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toHaveProperty('message', 'Config file missing.json not found');
      expect(host.state().processes).toEqual([]);
    });

    it('rejects a boot config without drives', async () => {
      host.addFile('broken.json', JSON.stringify({ 'boot-source': { kernel_image_path: 'k' }, drives: [] }));

      await expect(supervisor.start({ ...START, bootConfigPath: 'broken.json' })).rejects.toThrow(
        /^Invalid boot configuration broken\.json: /
      );
    });

    it('runs a foreground VM attached to the terminal', async () => {
      const handle = await supervisor.start({ ...START, detached: false });

      expect(handle).toBeNull();
      expect(host.interactiveCommands).toEqual([VM_COMMAND]);
    });

    it('fails when the foreground VM exits with an error', async () => {
      host.interactiveExitCode = 1;

      await expect(supervisor.start({ ...START, detached: false })).rejects.toThrow('Firecracker exited with code 1');
    });
  });

  describe('stop', () => {
    it('terminates the VM and removes its sockets', async () => {
      await supervisor.start(START);
      host.addFile(SOCKET, '', 'socket');

      const stopped = await supervisor.stop(SOCKET);

      expect(stopped).toEqual([4100]);
      expect(host.commands).toContain('kill -TERM 4100');
      expect(host.commands).not.toContain('kill -KILL 4100');
      expect(host.state().processes).toEqual([]);
      expect(host.state().files[SOCKET]).toBeUndefined();
    });

    it('kills a VM that ignores SIGTERM', async () => {
      host.ignoreTerm = true;
      host.addProcess(VM_COMMAND);

      await supervisor.stop(SOCKET);

      expect(host.commands).toContain('kill -TERM 4100');
      expect(host.commands).toContain('kill -KILL 4100');
      expect(host.state().processes).toEqual([]);
    });

    it('is a no-op when nothing is running', async () => {
      expect(await supervisor.stop(SOCKET)).toEqual([]);
      expect(host.commands.some((c) => c.startsWith('kill'))).toBe(false);
    });
  });

  describe('status and list', () => {
    it('reports a stopped VM', async () => {
      expect(await supervisor.status(SOCKET)).toEqual({
        running: false,
        pid: undefined,
        pids: [],
        session: undefined,
        socketPresent: false,
      });
    });

    it('reports a running VM', async () => {
      host.addFile(SOCKET, '', 'socket');
      await supervisor.start(START);

      const status = await supervisor.status(SOCKET);

      expect(status).toEqual({ running: true, pid: 4100, pids: [4100], session: 'firecracker', socketPresent: true });
    });

    it('lists hypervisor processes with their arguments', async () => {
      host.addProcess('firecracker --api-sock /tmp/a.sock --config-file a.json');
      host.addProcess('/usr/local/bin/firecracker --api-sock /tmp/b.sock');
      host.addProcess('tmux new-session -d -s firecracker firecracker --api-sock /tmp/c.sock');

      expect(await supervisor.list()).toEqual([
        {
          pid: 4100,
          command: 'firecracker --api-sock /tmp/a.sock --config-file a.json',
          socketPath: '/tmp/a.sock',
          configFile: 'a.json',
        },
        {
          pid: 4101,
          command: '/usr/local/bin/firecracker --api-sock /tmp/b.sock',
          socketPath: '/tmp/b.sock',
          configFile: undefined,
        },
      ]);
    });
  });

  describe('attach', () => {
    it('refuses when no VM is running', async () => {
      const error = await supervisor.attach().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toHaveProperty('message', 'Firecracker is not running. Start the VM first.');
    });

    it('prefers the tmux session', async () => {
      await supervisor.start(START);

      expect(await supervisor.attach()).toBe('session');
      expect(host.interactiveCommands).toEqual(['tmux attach-session -t firecracker']);
    });

    it("falls back to the process's terminal", async () => {
      host.addProcess(VM_COMMAND);

      expect(await supervisor.attach()).toBe('tty');
      expect(host.interactiveCommands).toEqual(['screen /dev/pts/3 115200']);
    });

    it('falls back to the console socket', async () => {
      host.processTty = '?';
      host.addProcess(VM_COMMAND);
      host.addFile('/tmp/firecracker-console.sock', '', 'socket');

      expect(await supervisor.attach()).toBe('console-socket');
      expect(host.interactiveCommands).toEqual(['socat -,raw,echo=0 UNIX-CONNECT:/tmp/firecracker-console.sock']);
    });

    it('lists every attempt when all methods fail', async () => {
      host.processTty = '?';
      host.addProcess(VM_COMMAND);

      const error = await supervisor.attach().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AttachError);
      expect(error).toHaveProperty('attempts', [
        { method: 'tmux session', detail: 'no session named firecracker' },
        { method: 'controlling terminal', detail: 'process 4100 has no controlling terminal' },
        { method: 'console socket', detail: '/tmp/firecracker-console.sock does not exist' },
      ]);
    });
  });

  describe('resumeFromSnapshot', () => {
    const source = {
      bootConfigPath: 'snapshots/s1/vm-config.json',
      memoryPath: 'snapshots/s1/memory',
      statePath: 'snapshots/s1/mem_dump',
    };

    it('starts an empty VM and loads the snapshot into it', async () => {
      const handle = await supervisor.resumeFromSnapshot(source, SOCKET);

      expect(handle.pid).toBe(4100);
      expect(host.state().processes).toEqual([{ pid: 4100, command: `firecracker --api-sock ${SOCKET}` }]);
      expect(controlPlane.calls).toEqual([
        { op: 'ready', socketPath: SOCKET },
        {
          op: 'load',
          socketPath: SOCKET,
          body: {
            snapshot_path: 'snapshots/s1/mem_dump',
            mem_backend: { backend_type: 'File', backend_path: 'snapshots/s1/memory' },
            enable_diff_snapshots: false,
            resume_vm: true,
          },
        },
      ]);
    });

    it('reports a load failure as a control-plane failure', async () => {
      controlPlane.failOn.add('load');

      const error = await supervisor.resumeFromSnapshot(source, SOCKET).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ControlPlaneFailure);
      expect(error).toMatchObject({ step: 'load', vmPaused: false });
    });
  });
});
