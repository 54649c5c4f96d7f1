import { FirecrackerApiError, type VmControlPlane } from '../../services/firecracker-api.js';
import type { SnapshotCreateParams, SnapshotLoadParams, VmStateRequest } from '../../types/firecracker.js';
import type { FakeHost } from './fake-host.js';

export type ControlPlaneOp = 'pause' | 'snapshot' | 'resume' | 'load' | 'ready';

export interface ControlPlaneCall {
  op: ControlPlaneOp;
  socketPath: string;
  body?: SnapshotCreateParams | SnapshotLoadParams;
}

/**
 * In-memory control plane. Snapshot files are written to the fake host so
 * that later verify/restore steps find them.
 */
export class FakeControlPlane implements VmControlPlane {
  readonly calls: ControlPlaneCall[] = [];
  readonly failOn = new Set<ControlPlaneOp>();
  vmState: 'Running' | 'Paused' = 'Running';

  constructor(private readonly host?: FakeHost) {}

  get ops(): ControlPlaneOp[] {
    return this.calls.map((call) => call.op);
  }

  async setVmState(socketPath: string, state: VmStateRequest): Promise<void> {
    const op = state === 'Paused' ? 'pause' : 'resume';
    this.calls.push({ op, socketPath });
    if (this.failOn.has(op)) {
      throw new FirecrackerApiError('PATCH', '/vm', 400, `Cannot ${op} the microVM`);
    }
    this.vmState = state === 'Paused' ? 'Paused' : 'Running';
  }

  async createSnapshot(socketPath: string, params: SnapshotCreateParams): Promise<void> {
    this.calls.push({ op: 'snapshot', socketPath, body: params });
    if (this.failOn.has('snapshot')) {
      throw new FirecrackerApiError('PUT', '/snapshot/create', 400, 'No space left on device');
    }
    this.host?.addFile(params.mem_file_path, 'guest-memory');
    this.host?.addFile(params.snapshot_path, 'vm-state');
  }

  async loadSnapshot(socketPath: string, params: SnapshotLoadParams): Promise<void> {
    this.calls.push({ op: 'load', socketPath, body: params });
    if (this.failOn.has('load')) {
      throw new FirecrackerApiError('PUT', '/snapshot/load', 400, 'Invalid snapshot file');
    }
    this.vmState = params.resume_vm ? 'Running' : 'Paused';
  }

  async waitUntilReady(socketPath: string): Promise<void> {
    this.calls.push({ op: 'ready', socketPath });
    if (this.failOn.has('ready')) {
      throw new Error(`Timeout waiting for API socket ${socketPath}`);
    }
  }
}
