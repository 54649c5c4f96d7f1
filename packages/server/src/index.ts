export { LifecycleOrchestrator } from './services/orchestrator.js';
export type { SandboxStatus, SetupResult, RestoreResult, StartRequest } from './services/orchestrator.js';
export { CommandRunner, ShellExecutor } from './services/command-runner.js';
export type { HostExecutor, ExecResult, CommandResult, RunOptions } from './services/command-runner.js';
export { NetworkResource } from './services/network.js';
export { ControlSocketResource } from './services/control-socket.js';
export { VmProcessSupervisor } from './services/vm-supervisor.js';
export { SnapshotController } from './services/snapshots.js';
export { FirecrackerApiClient, FirecrackerApiError } from './services/firecracker-api.js';
export type { VmControlPlane } from './services/firecracker-api.js';
export { loadConfig, DEFAULT_CONFIG } from './services/config.js';
export { createApp, startServer } from './server.js';
export { OperationLock } from './routes/sandbox.js';
export type { SandboxFactory } from './routes/sandbox.js';
export * from './utils/errors.js';
export type * from './types/sandbox.js';
export type * from './types/firecracker.js';
