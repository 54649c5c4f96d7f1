/**
 * LifecycleOrchestrator - named commands over the sandbox resources
 *
 *   setup    = network up -> socket activate -> VM start
 *   teardown = VM stop -> network down -> socket deactivate
 *   restore  = verify snapshot -> VM stop -> network down -> network up
 *              -> socket activate -> VM resume from snapshot
 *
 * Each step is idempotent, so every command can be re-run after a partial
 * failure and converges to the same end state.
 */

import { CommandRunner, ShellExecutor, type HostExecutor } from './command-runner.js';
import { ControlSocketResource } from './control-socket.js';
import { FirecrackerApiClient, type VmControlPlane } from './firecracker-api.js';
import { NetworkResource } from './network.js';
import { SnapshotController, type VerifiedSnapshot } from './snapshots.js';
import { VmProcessSupervisor, type AttachMethod } from './vm-supervisor.js';
import type {
  NetworkConfig,
  NetworkInfo,
  NetworkState,
  SandboxConfig,
  SnapshotRecord,
  SnapshotSummary,
  VmProcessHandle,
  VmProcessInfo,
  VmStatus,
} from '../types/sandbox.js';
import { createLogger } from '../utils/logger.js';

export interface OrchestratorComponents {
  runner: CommandRunner;
  network: NetworkResource;
  socket: ControlSocketResource;
  supervisor: VmProcessSupervisor;
  snapshots: SnapshotController;
}

export interface StartRequest {
  detached: boolean;
  bootConfigPath?: string;
}

export interface SetupResult {
  network: NetworkState;
  vm: VmProcessHandle | null;
}

export interface RestoreResult {
  snapshot: VerifiedSnapshot;
  network: NetworkState;
  vm: VmProcessHandle;
}

export interface SandboxStatus {
  vm: VmStatus;
  network: NetworkInfo;
}

const log = createLogger('Orchestrator');

export class LifecycleOrchestrator {
  readonly config: SandboxConfig;
  private runner: CommandRunner;
  private network: NetworkResource;
  private socket: ControlSocketResource;
  private supervisor: VmProcessSupervisor;
  private snapshots: SnapshotController;

  constructor(config: SandboxConfig, components: OrchestratorComponents) {
    this.config = config;
    this.runner = components.runner;
    this.network = components.network;
    this.socket = components.socket;
    this.supervisor = components.supervisor;
    this.snapshots = components.snapshots;
  }

  /**
   * Wire every component from one configuration
   */
  static create(
    config: SandboxConfig,
    executor: HostExecutor = new ShellExecutor(),
    controlPlane?: VmControlPlane
  ): LifecycleOrchestrator {
    const runner = new CommandRunner(executor, { dryRun: config.dryRun, verbose: config.verbose });
    const api = controlPlane ?? new FirecrackerApiClient(runner);
    const supervisor = new VmProcessSupervisor(runner, api, {
      firecrackerBinary: config.firecrackerBinary,
      sessionName: config.sessionName,
      logPath: config.logPath,
      consoleSocketPath: config.consoleSocketPath,
      startTimeoutMs: config.startTimeoutMs,
      stopTimeoutMs: config.stopTimeoutMs,
      pollIntervalMs: config.pollIntervalMs,
    });

    return new LifecycleOrchestrator(config, {
      runner,
      network: new NetworkResource(runner),
      socket: new ControlSocketResource(runner, config.socketMode),
      supervisor,
      snapshots: new SnapshotController(runner, api, supervisor, {
        snapshotsDir: config.snapshotsDir,
        socketPath: config.socketPath,
        bootConfigPath: config.bootConfigPath,
      }),
    });
  }

  /**
   * Commands issued so far (the dry-run trace)
   */
  get history(): string[] {
    return this.runner.history;
  }

  async setup(request: StartRequest): Promise<SetupResult> {
    log.info('Setting up sandbox: network -> socket -> VM');
    const network = await this.network.bringUp(this.networkConfig());
    const bootConfigPath = request.bootConfigPath ?? this.config.bootConfigPath;

    // A running VM holds the socket path; recreating it would cut the VM off
    const running = await this.supervisor.findPids();
    if (running.length > 0) {
      log.warn(`VM already running (PID ${running[0]}); socket left in place`);
      const vm = await this.supervisor.start({ bootConfigPath, socketPath: this.config.socketPath, detached: true });
      return { network, vm };
    }

    await this.socket.activate(this.config.socketPath);
    const vm = await this.supervisor.start({
      bootConfigPath,
      socketPath: this.config.socketPath,
      detached: request.detached,
    });
    return { network, vm };
  }

  async teardown(): Promise<void> {
    log.info('Tearing down sandbox: VM -> network -> socket');
    await this.supervisor.stop(this.config.socketPath);
    await this.network.tearDown(this.networkConfig());
    await this.socket.deactivate(this.config.socketPath);
    log.success('Sandbox torn down');
  }

  /**
   * Replace whatever runs now with the VM captured in snapshot id. Nothing is
   * touched if the snapshot is missing or incomplete.
   */
  async restore(id: string): Promise<RestoreResult> {
    const snapshot = await this.snapshots.verify(id);

    log.info(`Restoring snapshot ${id}`);
    await this.supervisor.stop(this.config.socketPath);
    await this.network.tearDown(this.networkConfig());
    const network = await this.network.bringUp(this.networkConfig());
    await this.socket.activate(this.config.socketPath);
    const vm = await this.supervisor.resumeFromSnapshot(snapshot, this.config.socketPath);
    return { snapshot, network, vm };
  }

  async snapshot(): Promise<SnapshotRecord> {
    return this.snapshots.create();
  }

  async listSnapshots(): Promise<SnapshotSummary[]> {
    return this.snapshots.list();
  }

  async activate(): Promise<void> {
    await this.socket.activate(this.config.socketPath);
  }

  async deactivate(): Promise<void> {
    await this.socket.deactivate(this.config.socketPath);
  }

  async netUp(): Promise<NetworkState> {
    return this.network.bringUp(this.networkConfig());
  }

  async netDown(): Promise<void> {
    await this.network.tearDown(this.networkConfig());
  }

  async netInfo(): Promise<NetworkInfo> {
    return this.network.inspect(this.networkConfig());
  }

  /**
   * Start the VM, activating the socket first if it is missing
   */
  async start(request: StartRequest): Promise<VmProcessHandle | null> {
    if (!(await this.socket.isActive(this.config.socketPath))) {
      log.warn('Firecracker API socket not found. Activating...');
      await this.socket.activate(this.config.socketPath);
    }
    return this.supervisor.start({
      bootConfigPath: request.bootConfigPath ?? this.config.bootConfigPath,
      socketPath: this.config.socketPath,
      detached: request.detached,
    });
  }

  async stop(): Promise<number[]> {
    return this.supervisor.stop(this.config.socketPath);
  }

  async login(): Promise<AttachMethod> {
    return this.supervisor.attach();
  }

  async status(): Promise<SandboxStatus> {
    const vm = await this.supervisor.status(this.config.socketPath);
    const network = await this.network.inspect(this.networkConfig());
    return { vm, network };
  }

  async listVms(): Promise<VmProcessInfo[]> {
    return this.supervisor.list();
  }

  private networkConfig(): NetworkConfig {
    return {
      device: this.config.device,
      hostCidr: this.config.hostCidr,
      guestIp: this.config.guestIp,
      natChain: this.config.natChain,
      forwardChain: this.config.forwardChain,
    };
  }
}
