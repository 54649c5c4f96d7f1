/**
 * VmProcessSupervisor - the hypervisor OS process
 *
 * Processes are found by command line (pgrep -f) on every call, so nothing
 * about a running VM has to survive between invocations. Detached VMs run
 * inside a tmux session with the console teed to a log file.
 */

import * as path from 'path';
import type { CommandRunner } from './command-runner.js';
import type { VmControlPlane } from './firecracker-api.js';
import { readBootConfig } from './boot-config.js';
import type { VmProcessHandle, VmProcessInfo, VmStatus } from '../types/sandbox.js';
import {
  AttachError,
  ConfigurationError,
  ControlPlaneFailure,
  ProcessStartFailure,
  type AttachAttempt,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { shellJoin, shellQuote, shellSplit } from '../utils/shell.js';

export interface SupervisorOptions {
  firecrackerBinary: string;
  sessionName: string;
  logPath: string;
  consoleSocketPath: string;
  startTimeoutMs: number;
  stopTimeoutMs: number;
  pollIntervalMs: number;
}

export interface StartOptions {
  bootConfigPath: string;
  socketPath: string;
  detached: boolean;
}

/** Files a snapshot-resume start needs */
export interface ResumeSource {
  bootConfigPath: string;
  memoryPath: string;
  statePath: string;
}

export type AttachMethod = 'session' | 'tty' | 'console-socket';

const log = createLogger('VmSupervisor');

const LOG_TAIL_LINES = 50;

export class VmProcessSupervisor {
  private runner: CommandRunner;
  private controlPlane: VmControlPlane;
  private options: SupervisorOptions;

  constructor(runner: CommandRunner, controlPlane: VmControlPlane, options: SupervisorOptions) {
    this.runner = runner;
    this.controlPlane = controlPlane;
    this.options = options;
  }

  /**
   * Launch the hypervisor. Foreground blocks until the VM exits and returns
   * null; detached returns once the process is confirmed alive.
   */
  async start(opts: StartOptions): Promise<VmProcessHandle | null> {
    await readBootConfig(this.runner, opts.bootConfigPath);

    const command = shellJoin([
      this.options.firecrackerBinary,
      '--api-sock',
      opts.socketPath,
      '--config-file',
      opts.bootConfigPath,
    ]);

    if (!opts.detached) {
      log.info('Launching Firecracker in the foreground...');
      const exitCode = await this.runner.runInteractive(command);
      if (exitCode !== 0) {
        throw new ProcessStartFailure(`Firecracker exited with code ${exitCode}`, '');
      }
      log.info('Firecracker exited');
      return null;
    }

    const existing = await this.findPids();
    if (existing.length > 0) {
      log.warn(`VM is already running (PID ${existing[0]})`);
      return this.handleFor(existing[0], opts.bootConfigPath, opts.socketPath);
    }

    return this.launchDetached(command, opts.bootConfigPath, opts.socketPath);
  }

  /**
   * Launch the hypervisor with no boot config and load a snapshot into it
   */
  async resumeFromSnapshot(source: ResumeSource, socketPath: string): Promise<VmProcessHandle> {
    const command = shellJoin([this.options.firecrackerBinary, '--api-sock', socketPath]);
    const handle = await this.launchDetached(command, source.bootConfigPath, socketPath);

    if (!this.runner.dryRun) {
      try {
        await this.controlPlane.waitUntilReady(socketPath, this.options.startTimeoutMs, this.options.pollIntervalMs);
      } catch (error) {
        throw new ControlPlaneFailure('ping', false, error);
      }
    }

    try {
      await this.controlPlane.loadSnapshot(socketPath, {
        snapshot_path: source.statePath,
        mem_backend: { backend_type: 'File', backend_path: source.memoryPath },
        enable_diff_snapshots: false,
        resume_vm: true,
      });
    } catch (error) {
      throw new ControlPlaneFailure('load', false, error);
    }

    log.success(`VM restored from snapshot (PID ${handle.pid})`);
    return handle;
  }

  /**
   * Terminate every hypervisor process (SIGTERM, then SIGKILL) and remove its
   * sockets. A no-op when nothing is running.
   */
  async stop(socketPath: string): Promise<number[]> {
    const pids = await this.findPids();

    if (pids.length === 0) {
      log.info('No VM is currently running');
    } else {
      log.info(`Stopping Firecracker (PID ${pids.join(', ')})...`);
      for (const pid of pids) {
        await this.runner.run(`kill -TERM ${pid}`, { allowFailure: true });
      }

      if (!this.runner.dryRun) {
        const survivors = await this.waitForExit(pids, this.options.stopTimeoutMs);
        for (const pid of survivors) {
          log.warn(`Process ${pid} did not terminate gracefully, forcing kill`);
          await this.runner.run(`kill -KILL ${pid}`, { allowFailure: true });
        }

        // Anything that still matches (e.g. a VM launched while we waited)
        for (const pid of await this.findPids()) {
          await this.runner.run(`kill -KILL ${pid}`, { allowFailure: true });
        }
      }
    }

    await this.runner.run(shellJoin(['tmux', 'kill-session', '-t', this.options.sessionName]), {
      allowFailure: true,
    });
    await this.runner.run(shellJoin(['rm', '-f', socketPath, this.options.consoleSocketPath]), {
      allowFailure: true,
    });

    if (pids.length > 0) {
      log.success('Firecracker stopped');
    }
    return pids;
  }

  /**
   * Is a hypervisor running, and under which pid
   */
  async status(socketPath: string): Promise<VmStatus> {
    const pids = await this.findPids();
    const session = await this.hasSession();
    const socketPresent = await this.runner.exists(socketPath);

    return {
      running: pids.length > 0,
      pid: pids[0],
      pids,
      session: session ? this.options.sessionName : undefined,
      socketPresent,
    };
  }

  /**
   * Every hypervisor process with its socket and config arguments
   */
  async list(): Promise<VmProcessInfo[]> {
    const result = await this.runner.run(shellJoin(['pgrep', '-af', this.processPattern()]), { probe: true });
    if (!result.succeeded) return [];

    const processes: VmProcessInfo[] = [];
    for (const line of result.output.split('\n')) {
      const match = line.trim().match(/^(\d+)\s+(.*)$/);
      if (!match) continue;

      const argv = shellSplit(match[2]);
      const argAfter = (flag: string): string | undefined => {
        const index = argv.indexOf(flag);
        return index === -1 ? undefined : argv[index + 1];
      };

      processes.push({
        pid: Number(match[1]),
        command: match[2],
        socketPath: argAfter('--api-sock'),
        configFile: argAfter('--config-file'),
      });
    }
    return processes;
  }

  /**
   * Connect the terminal to the running VM's console. Tries the tmux session,
   * then the process's controlling tty, then the console socket.
   */
  async attach(): Promise<AttachMethod> {
    const pids = await this.findPids();
    if (pids.length === 0) {
      throw new ConfigurationError('Firecracker is not running. Start the VM first.');
    }

    const attempts: AttachAttempt[] = [];
    const session = this.options.sessionName;

    if (await this.hasSession()) {
      log.info(`Attaching to tmux session ${session} (detach with Ctrl-b d)`);
      const code = await this.runner.runInteractive(shellJoin(['tmux', 'attach-session', '-t', session]));
      if (code === 0) return 'session';
      attempts.push({ method: 'tmux session', detail: `tmux attach-session -t ${session} exited with ${code}` });
    } else {
      attempts.push({ method: 'tmux session', detail: `no session named ${session}` });
    }

    const ttyResult = await this.runner.run(`ps -o tty= -p ${pids[0]}`, { probe: true });
    const tty = ttyResult.output.trim();
    if (ttyResult.succeeded && tty && tty !== '?') {
      log.info(`Connecting to /dev/${tty} (detach with Ctrl-a d)`);
      const code = await this.runner.runInteractive(shellJoin(['screen', `/dev/${tty}`, '115200']));
      if (code === 0) return 'tty';
      attempts.push({ method: 'controlling terminal', detail: `screen /dev/${tty} exited with ${code}` });
    } else {
      attempts.push({ method: 'controlling terminal', detail: `process ${pids[0]} has no controlling terminal` });
    }

    const consoleSocket = this.options.consoleSocketPath;
    if (await this.runner.exists(consoleSocket)) {
      log.info(`Connecting to console socket ${consoleSocket}`);
      const code = await this.runner.runInteractive(
        shellJoin(['socat', '-,raw,echo=0', `UNIX-CONNECT:${consoleSocket}`])
      );
      if (code === 0) return 'console-socket';
      attempts.push({ method: 'console socket', detail: `socat on ${consoleSocket} exited with ${code}` });
    } else {
      attempts.push({ method: 'console socket', detail: `${consoleSocket} does not exist` });
    }

    throw new AttachError(attempts);
  }

  /**
   * pids of processes whose command line starts with the hypervisor binary
   */
  async findPids(): Promise<number[]> {
    const result = await this.runner.run(shellJoin(['pgrep', '-f', this.processPattern()]), { probe: true });
    if (!result.succeeded) return [];
    return result.output
      .split('\n')
      .map((line) => Number.parseInt(line.trim(), 10))
      .filter((pid) => Number.isInteger(pid) && pid > 0);
  }

  private async launchDetached(command: string, bootConfigPath: string, socketPath: string): Promise<VmProcessHandle> {
    const { sessionName, logPath } = this.options;

    // A session left over from a VM that already exited would block new-session.
    await this.runner.run(shellJoin(['tmux', 'kill-session', '-t', sessionName]), { allowFailure: true });

    log.info(`Launching Firecracker in tmux session ${sessionName} (log: ${logPath})...`);
    const pipeline = `${command} 2>&1 | tee -a ${shellQuote(logPath)}`;
    await this.runner.run(shellJoin(['tmux', 'new-session', '-d', '-s', sessionName, pipeline]));

    if (this.runner.dryRun) {
      return { pid: 0, bootConfigPath, socketPath, logPath, session: sessionName };
    }

    const pid = await this.waitForStart();
    if (pid === null) {
      const tail = await this.runner.run(shellJoin(['tail', '-n', String(LOG_TAIL_LINES), logPath]), { probe: true });
      throw new ProcessStartFailure(
        `Firecracker failed to start within ${this.options.startTimeoutMs}ms`,
        tail.succeeded ? tail.output : ''
      );
    }

    log.success(`Firecracker MicroVM started (PID ${pid})`);
    return { pid, bootConfigPath, socketPath, logPath, session: sessionName };
  }

  private async waitForStart(): Promise<number | null> {
    const deadline = Date.now() + this.options.startTimeoutMs;
    do {
      await sleep(this.options.pollIntervalMs);
      const pids = await this.findPids();
      if (pids.length > 0) return pids[0];
    } while (Date.now() < deadline);
    return null;
  }

  /**
   * Wait until none of pids is alive; returns the ones still running
   */
  private async waitForExit(pids: number[], timeoutMs: number): Promise<number[]> {
    const deadline = Date.now() + timeoutMs;
    let alive = pids;
    while (alive.length > 0) {
      const current = new Set(await this.findPids());
      alive = alive.filter((pid) => current.has(pid));
      if (alive.length === 0 || Date.now() >= deadline) break;
      await sleep(this.options.pollIntervalMs);
    }
    return alive;
  }

  private async hasSession(): Promise<boolean> {
    const result = await this.runner.run(shellJoin(['tmux', 'has-session', '-t', this.options.sessionName]), {
      probe: true,
    });
    return result.succeeded;
  }

  private handleFor(pid: number, bootConfigPath: string, socketPath: string): VmProcessHandle {
    return { pid, bootConfigPath, socketPath, logPath: this.options.logPath, session: this.options.sessionName };
  }

  private processPattern(): string {
    const binary = path.basename(this.options.firecrackerBinary);
    return `^([^ ]*/)?${binary.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}( |$)`;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
