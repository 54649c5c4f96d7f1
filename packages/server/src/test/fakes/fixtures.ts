import { CommandRunner } from '../../services/command-runner.js';
import type { SupervisorOptions } from '../../services/vm-supervisor.js';
import { DEFAULT_CONFIG } from '../../services/config.js';
import type { SandboxConfig } from '../../types/sandbox.js';
import type { FakeHost } from './fake-host.js';

export const BOOT_CONFIG = {
  'boot-source': {
    kernel_image_path: 'images/vmlinux',
    boot_args: 'console=ttyS0 reboot=k panic=1',
  },
  drives: [
    {
      drive_id: 'rootfs',
      path_on_host: 'images/rootfs.ext4',
      is_root_device: true,
      is_read_only: false,
    },
  ],
  'machine-config': {
    vcpu_count: 2,
    mem_size_mib: 1024,
  },
  'network-interfaces': [{ iface_id: 'eth0', host_dev_name: 'tap0' }],
};

/** Boot config plus the kernel and rootfs it points at */
export function addVmImages(host: FakeHost, bootConfigPath = 'vm-config.json'): void {
  host.addFile(bootConfigPath, JSON.stringify(BOOT_CONFIG, null, 2));
  host.addFile('images/vmlinux', 'kernel-image');
  host.addFile('images/rootfs.ext4', 'rootfs-image');
}

/** Short timeouts so start and stop polls finish quickly */
export const TEST_CONFIG: SandboxConfig = {
  ...DEFAULT_CONFIG,
  startTimeoutMs: 50,
  stopTimeoutMs: 20,
  pollIntervalMs: 1,
};

export const SUPERVISOR_OPTIONS: SupervisorOptions = {
  firecrackerBinary: TEST_CONFIG.firecrackerBinary,
  sessionName: TEST_CONFIG.sessionName,
  logPath: TEST_CONFIG.logPath,
  consoleSocketPath: TEST_CONFIG.consoleSocketPath,
  startTimeoutMs: TEST_CONFIG.startTimeoutMs,
  stopTimeoutMs: TEST_CONFIG.stopTimeoutMs,
  pollIntervalMs: TEST_CONFIG.pollIntervalMs,
};

export const VM_COMMAND = 'firecracker --api-sock /tmp/firecracker.socket --config-file vm-config.json';

export function createRunner(host: FakeHost, dryRun = false): CommandRunner {
  return new CommandRunner(host, { dryRun, verbose: false });
}
