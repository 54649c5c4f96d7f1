/**
 * Sandbox Types
 */

/**
 * Invocation-wide configuration. Built once from defaults, the config file,
 * the environment and CLI flags, then frozen and passed to every component.
 */
export interface SandboxConfig {
  /** Record commands instead of running mutations */
  dryRun: boolean;
  /** Echo every command and print debug lines */
  verbose: boolean;
  /** Control-plane socket path (--api-sock) */
  socketPath: string;
  /** Unix socket mode for the control endpoint, octal string */
  socketMode: string;
  /** Host tap device name */
  device: string;
  /** Host address with prefix, assigned to the tap device */
  hostCidr: string;
  /** Guest address inside the VM */
  guestIp: string;
  /** Firecracker boot configuration file (--config-file) */
  bootConfigPath: string;
  /** Directory holding one sub-directory per snapshot */
  snapshotsDir: string;
  /** Hypervisor binary, also the process-name pattern for pgrep */
  firecrackerBinary: string;
  /** tmux session name used for detached VMs */
  sessionName: string;
  /** Console log for detached VMs */
  logPath: string;
  /** Serial console socket exposed by the VM, if any */
  consoleSocketPath: string;
  /** Dedicated nat-table chain */
  natChain: string;
  /** Dedicated filter-table chain */
  forwardChain: string;
  /** Upper bound for the detached start confirmation poll */
  startTimeoutMs: number;
  /** Grace period between SIGTERM and SIGKILL */
  stopTimeoutMs: number;
  /** Interval between process existence checks */
  pollIntervalMs: number;
  /** Port for the HTTP API (serve) */
  serverPort: number;
}

/** Network settings for one sandbox */
export interface NetworkConfig {
  device: string;
  hostCidr: string;
  guestIp: string;
  natChain: string;
  forwardChain: string;
  /** Uplink resolved by bringUp; tearDown resolves it again when absent */
  uplink?: string;
}

/** What bringUp configured */
export interface NetworkState {
  device: string;
  hostCidr: string;
  guestIp: string;
  uplink: string;
}

export interface NetworkRuleStatus {
  rule: string;
  present: boolean;
}

/** net-info output */
export interface NetworkInfo {
  device: string;
  deviceExists: boolean;
  addressAssigned: boolean;
  hostCidr: string;
  guestIp: string;
  ipForwarding: boolean;
  uplink: string | null;
  rules: NetworkRuleStatus[];
}

/** A running (or just started) hypervisor process */
export interface VmProcessHandle {
  pid: number;
  bootConfigPath: string;
  socketPath: string;
  logPath?: string;
  /** tmux session when running detached */
  session?: string;
}

export interface VmStatus {
  running: boolean;
  pid?: number;
  pids: number[];
  session?: string;
  socketPresent: boolean;
}

/** One hypervisor process as reported by list-vms */
export interface VmProcessInfo {
  pid: number;
  command: string;
  socketPath?: string;
  configFile?: string;
}

export interface SnapshotFiles {
  memory: string;
  state: string;
  bootConfig: string;
  rootfs: string;
  kernel: string;
  metadata: string;
}

export interface SnapshotRecord {
  id: string;
  dir: string;
  createdAt: string;
  sourcePid: number;
  files: SnapshotFiles;
}

/** A snapshot directory found on disk */
export interface SnapshotSummary {
  id: string;
  dir: string;
  createdAt?: string;
  sourcePid?: number;
}
