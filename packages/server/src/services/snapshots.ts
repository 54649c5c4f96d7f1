/**
 * SnapshotController - pause, snapshot and resume a running VM
 *
 * Running -> Paused -> SnapshotWritten -> Resumed. A failure at any control
 * step aborts the sequence; the error says whether the VM was left paused.
 * Resume is always attempted once the VM has been paused.
 */

import * as path from 'path';
import type { CommandRunner } from './command-runner.js';
import type { VmControlPlane } from './firecracker-api.js';
import type { ResumeSource, VmProcessSupervisor } from './vm-supervisor.js';
import { readBootConfig, rootDrive } from './boot-config.js';
import type { SnapshotFiles, SnapshotRecord, SnapshotSummary } from '../types/sandbox.js';
import { ConfigurationError, ControlPlaneFailure } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { shellJoin } from '../utils/shell.js';

export const MEMORY_FILE = 'memory';
export const STATE_FILE = 'mem_dump';
export const BOOT_CONFIG_FILE = 'vm-config.json';
export const METADATA_FILE = 'metadata.txt';

const REQUIRED_FILES = [BOOT_CONFIG_FILE, MEMORY_FILE, STATE_FILE, METADATA_FILE];

export interface SnapshotControllerOptions {
  snapshotsDir: string;
  socketPath: string;
  bootConfigPath: string;
}

export interface VerifiedSnapshot extends ResumeSource {
  id: string;
  dir: string;
}

const log = createLogger('Snapshots');

export class SnapshotController {
  private runner: CommandRunner;
  private controlPlane: VmControlPlane;
  private supervisor: VmProcessSupervisor;
  private options: SnapshotControllerOptions;
  private clock: () => Date;

  constructor(
    runner: CommandRunner,
    controlPlane: VmControlPlane,
    supervisor: VmProcessSupervisor,
    options: SnapshotControllerOptions,
    clock: () => Date = () => new Date()
  ) {
    this.runner = runner;
    this.controlPlane = controlPlane;
    this.supervisor = supervisor;
    this.options = options;
    this.clock = clock;
  }

  /**
   * Snapshot the running VM into snapshots/<timestamp>/
   */
  async create(): Promise<SnapshotRecord> {
    const pids = await this.supervisor.findPids();
    if (pids.length === 0) {
      throw new ConfigurationError('No running VM: nothing to snapshot');
    }
    const sourcePid = pids[0];

    const { bootConfigPath, socketPath } = this.options;
    const bootConfig = await readBootConfig(this.runner, bootConfigPath);
    const rootfsPath = rootDrive(bootConfig).path_on_host;
    const kernelPath = bootConfig['boot-source'].kernel_image_path;

    const now = this.clock();
    const id = await this.allocateId(now);
    const dir = path.join(this.options.snapshotsDir, id);
    const files: SnapshotFiles = {
      memory: path.join(dir, MEMORY_FILE),
      state: path.join(dir, STATE_FILE),
      bootConfig: path.join(dir, BOOT_CONFIG_FILE),
      rootfs: path.join(dir, path.basename(rootfsPath)),
      kernel: path.join(dir, path.basename(kernelPath)),
      metadata: path.join(dir, METADATA_FILE),
    };

    log.info(`Creating snapshot ${id} of PID ${sourcePid}...`);
    await this.runner.run(shellJoin(['mkdir', '-p', dir]));

    try {
      await this.controlPlane.setVmState(socketPath, 'Paused');
    } catch (error) {
      throw new ControlPlaneFailure('pause', false, error);
    }
    log.info('VM paused');

    try {
      await this.controlPlane.createSnapshot(socketPath, {
        mem_file_path: files.memory,
        snapshot_path: files.state,
      });
    } catch (error) {
      const resumed = await this.tryResume(socketPath);
      throw new ControlPlaneFailure('snapshot', !resumed, error);
    }
    log.info('Snapshot written');

    try {
      await this.controlPlane.setVmState(socketPath, 'Resumed');
    } catch (error) {
      throw new ControlPlaneFailure('resume', true, error);
    }
    log.info('VM resumed');

    await this.runner.run(shellJoin(['cp', bootConfigPath, files.bootConfig]));
    await this.runner.run(shellJoin(['cp', rootfsPath, files.rootfs]));
    await this.runner.run(shellJoin(['cp', kernelPath, files.kernel]));

    const createdAt = now.toISOString();
    await this.runner.writeFile(
      files.metadata,
      formatMetadata({
        id,
        created_at: createdAt,
        source_pid: String(sourcePid),
        boot_config: bootConfigPath,
        rootfs: rootfsPath,
        kernel: kernelPath,
      })
    );

    log.success(`Snapshot ${id} saved to ${dir}`);
    return { id, dir, createdAt, sourcePid, files };
  }

  /**
   * Snapshots on disk, oldest first
   */
  async list(): Promise<SnapshotSummary[]> {
    const ids = await this.listIds();
    const summaries: SnapshotSummary[] = [];

    for (const id of ids) {
      const dir = path.join(this.options.snapshotsDir, id);
      const metadataPath = path.join(dir, METADATA_FILE);
      const summary: SnapshotSummary = { id, dir };

      if (await this.runner.exists(metadataPath)) {
        const metadata = parseMetadata(await this.runner.readFile(metadataPath));
        summary.createdAt = metadata.created_at;
        const pid = Number.parseInt(metadata.source_pid ?? '', 10);
        if (Number.isInteger(pid)) summary.sourcePid = pid;
      }

      summaries.push(summary);
    }

    return summaries;
  }

  /**
   * Check that a snapshot can be restored. Performs no mutation; the error
   * lists the snapshots that do exist.
   */
  async verify(id: string): Promise<VerifiedSnapshot> {
    if (!id || id.includes('/') || id === '.' || id === '..') {
      throw new ConfigurationError(`Invalid snapshot identifier '${id}'`);
    }

    const dir = path.join(this.options.snapshotsDir, id);
    if (!(await this.runner.exists(dir))) {
      throw new ConfigurationError(
        `Snapshot '${id}' not found in ${this.options.snapshotsDir}. ${await this.availableText()}`
      );
    }

    const missing: string[] = [];
    for (const file of REQUIRED_FILES) {
      if (!(await this.runner.exists(path.join(dir, file)))) {
        missing.push(file);
      }
    }
    // The image copies are named after the drives in the saved boot config
    if (!missing.includes(BOOT_CONFIG_FILE)) {
      for (const file of await this.imageFiles(path.join(dir, BOOT_CONFIG_FILE))) {
        if (!(await this.runner.exists(path.join(dir, file)))) {
          missing.push(file);
        }
      }
    }
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Snapshot '${id}' is incomplete (missing ${missing.join(', ')}). ${await this.availableText()}`
      );
    }

    return {
      id,
      dir,
      bootConfigPath: path.join(dir, BOOT_CONFIG_FILE),
      memoryPath: path.join(dir, MEMORY_FILE),
      statePath: path.join(dir, STATE_FILE),
    };
  }

  private async imageFiles(bootConfigPath: string): Promise<string[]> {
    const bootConfig = await readBootConfig(this.runner, bootConfigPath);
    return [
      path.basename(rootDrive(bootConfig).path_on_host),
      path.basename(bootConfig['boot-source'].kernel_image_path),
    ];
  }

  private async listIds(): Promise<string[]> {
    const entries = await this.runner.listDir(this.options.snapshotsDir);
    return entries.sort();
  }

  private async availableText(): Promise<string> {
    const ids = await this.listIds();
    return `Available snapshots: ${ids.length > 0 ? ids.join(', ') : '(none)'}`;
  }

  /**
   * Timestamp id, suffixed when another snapshot was taken in the same second
   */
  private async allocateId(now: Date): Promise<string> {
    const base = formatTimestamp(now);
    let id = base;
    for (let n = 2; await this.runner.exists(path.join(this.options.snapshotsDir, id)); n++) {
      id = `${base}-${n}`;
    }
    return id;
  }

  private async tryResume(socketPath: string): Promise<boolean> {
    try {
      await this.controlPlane.setVmState(socketPath, 'Resumed');
      log.warn('Snapshot failed; VM resumed');
      return true;
    } catch (error) {
      log.error(`Snapshot failed and resume failed too: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}

/**
 * YYYYMMDD-HHMMSS in UTC
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function formatMetadata(fields: Record<string, string>): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${value}`)
    .join('\n') + '\n';
}

export function parseMetadata(text: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of text.split('\n')) {
    const index = line.indexOf('=');
    if (index <= 0) continue;
    fields[line.slice(0, index).trim()] = line.slice(index + 1).trim();
  }
  return fields;
}
