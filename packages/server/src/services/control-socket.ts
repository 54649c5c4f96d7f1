/**
 * ControlSocketResource - the control-plane endpoint file
 */

import type { CommandRunner } from './command-runner.js';
import { createLogger } from '../utils/logger.js';
import { shellJoin } from '../utils/shell.js';

const log = createLogger('ControlSocket');

export class ControlSocketResource {
  private runner: CommandRunner;
  private mode: string;

  constructor(runner: CommandRunner, mode = '660') {
    this.runner = runner;
    this.mode = mode;
  }

  /**
   * Replace whatever is at the path with a fresh endpoint, owner/group rw.
   * Must not be called while a VM holds the path.
   */
  async activate(path: string): Promise<void> {
    log.info(`Activating control socket at ${path}`);
    await this.runner.run(shellJoin(['rm', '-f', path]));
    await this.runner.run(shellJoin(['mkfifo', path]));
    await this.runner.run(shellJoin(['chmod', this.mode, path]));
    log.success(`Control socket activated at ${path}`);
  }

  /**
   * Remove the endpoint; absence is fine
   */
  async deactivate(path: string): Promise<void> {
    log.info(`Deactivating control socket at ${path}`);
    await this.runner.run(shellJoin(['rm', '-f', path]), { allowFailure: true });
    log.success('Control socket removed');
  }

  async isActive(path: string): Promise<boolean> {
    return this.runner.exists(path);
  }
}
