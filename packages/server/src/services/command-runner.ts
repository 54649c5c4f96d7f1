/**
 * CommandRunner - the single path from the sandbox to the host OS
 *
 * Every component issues host commands and file writes through a runner so
 * that dry-run and verbose behave the same everywhere. The HostExecutor seam
 * is the only code that touches child_process or fs.
 */

import { spawn } from 'child_process';
import { readFile, writeFile } from 'fs/promises';
import { CommandFailedError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { shellQuote } from '../utils/shell.js';

export interface ExecResult {
  exitCode: number;
  /** stdout and stderr, interleaved, trimmed */
  output: string;
}

export interface HostExecutor {
  exec(command: string): Promise<ExecResult>;
  /** Run attached to the caller's terminal, resolve with the exit code */
  interactive(command: string): Promise<number>;
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
}

export interface RunOptions {
  /** Non-zero exit is expected (e.g. removing something already gone) */
  allowFailure?: boolean;
  /** Read-only query: runs even in dry-run and never throws */
  probe?: boolean;
}

export interface CommandResult {
  succeeded: boolean;
  output: string;
  exitCode: number;
}

export interface RunnerOptions {
  dryRun: boolean;
  verbose: boolean;
}

const log = createLogger('CommandRunner');

/**
 * Executes commands with /bin/sh on the real host
 */
export class ShellExecutor implements HostExecutor {
  exec(command: string): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn('/bin/sh', ['-c', command]);
      let output = '';

      proc.stdout.on('data', (data) => {
        output += data.toString();
      });

      proc.stderr.on('data', (data) => {
        output += data.toString();
      });

      proc.on('close', (code) => {
        resolve({
          exitCode: code ?? 1,
          output: output.trim(),
        });
      });

      proc.on('error', (err) => {
        reject(err);
      });
    });
  }

  interactive(command: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const proc = spawn('/bin/sh', ['-c', command], { stdio: 'inherit' });
      proc.on('close', (code) => resolve(code ?? 1));
      proc.on('error', (err) => reject(err));
    });
  }

  readFile(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  writeFile(path: string, content: string): Promise<void> {
    return writeFile(path, content);
  }
}

export class CommandRunner {
  private readonly executor: HostExecutor;
  private readonly options: RunnerOptions;
  private readonly trail: string[] = [];

  constructor(executor: HostExecutor, options: RunnerOptions) {
    this.executor = executor;
    this.options = { ...options };
  }

  get dryRun(): boolean {
    return this.options.dryRun;
  }

  get verbose(): boolean {
    return this.options.verbose;
  }

  /**
   * Every command and side effect issued so far, in order
   */
  get history(): string[] {
    return [...this.trail];
  }

  /**
   * Run a host command
   */
  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    this.trail.push(command);

    if (this.options.dryRun && !options.probe) {
      log.info(`[dry-run] ${command}`);
      return { succeeded: true, output: '', exitCode: 0 };
    }

    if (this.options.verbose) {
      log.info(`$ ${command}`);
    }

    const result = await this.executor.exec(command);
    if (result.exitCode === 0) {
      return { succeeded: true, output: result.output, exitCode: 0 };
    }

    if (options.probe || options.allowFailure) {
      if (!options.probe && this.options.verbose) {
        log.debug(`tolerated exit ${result.exitCode}: ${command}${result.output ? ` (${result.output})` : ''}`);
      }
      return { succeeded: false, output: result.output, exitCode: result.exitCode };
    }

    throw new CommandFailedError(command, result.exitCode, result.output);
  }

  /**
   * Run a command attached to the terminal (console, attach)
   */
  async runInteractive(command: string): Promise<number> {
    this.trail.push(command);

    if (this.options.dryRun) {
      log.info(`[dry-run] ${command}`);
      return 0;
    }

    if (this.options.verbose) {
      log.info(`$ ${command}`);
    }

    return this.executor.interactive(command);
  }

  /**
   * Check whether a path exists
   */
  async exists(path: string): Promise<boolean> {
    const result = await this.run(`test -e ${shellQuote(path)}`, { probe: true });
    return result.succeeded;
  }

  /**
   * List directory entries; a missing directory lists as empty
   */
  async listDir(path: string): Promise<string[]> {
    const result = await this.run(`ls -1A ${shellQuote(path)}`, { probe: true });
    if (!result.succeeded) return [];
    return result.output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async readFile(path: string): Promise<string> {
    return this.executor.readFile(path);
  }

  async writeFile(path: string, content: string): Promise<void> {
    const description = `write ${shellQuote(path)} (${Buffer.byteLength(content)} bytes)`;
    if (!this.trace(description)) return;
    await this.executor.writeFile(path, content);
  }

  /**
   * Record a side effect that is not a shell command (e.g. a control-plane
   * request). Returns false in dry-run, where the caller must skip it.
   */
  trace(description: string): boolean {
    this.trail.push(description);

    if (this.options.dryRun) {
      log.info(`[dry-run] ${description}`);
      return false;
    }

    if (this.options.verbose) {
      log.info(`> ${description}`);
    }
    return true;
  }
}
