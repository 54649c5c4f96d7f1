/**
 * Sandbox error kinds.
 *
 * "Already absent" is not an error kind: steps that tolerate it run with
 * allowFailure and report { succeeded: false } instead of throwing.
 */

export type SandboxErrorKind =
  | 'configuration'
  | 'process-start'
  | 'control-plane'
  | 'command-failed'
  | 'attach'
  | 'busy';

export abstract class SandboxError extends Error {
  abstract readonly kind: SandboxErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or unusable input: no default route, missing snapshot, bad boot config */
export class ConfigurationError extends SandboxError {
  readonly kind = 'configuration';
}

/** The hypervisor process did not come up; output holds what it printed */
export class ProcessStartFailure extends SandboxError {
  readonly kind = 'process-start';

  constructor(message: string, readonly output: string) {
    super(output ? `${message}\n${output}` : message);
  }
}

export type ControlPlaneStep = 'pause' | 'snapshot' | 'resume' | 'load' | 'ping';

/**
 * A control-plane request failed. vmPaused tells the operator whether the VM
 * was left paused by the failed sequence.
 */
export class ControlPlaneFailure extends SandboxError {
  readonly kind = 'control-plane';

  constructor(
    readonly step: ControlPlaneStep,
    readonly vmPaused: boolean,
    readonly reason: unknown
  ) {
    super(
      `Control-plane ${step} request failed: ${describeError(reason)}` +
        (vmPaused ? ' (VM is left PAUSED)' : ' (VM is not paused)')
    );
  }
}

/** A host command that was not allowed to fail exited non-zero */
export class CommandFailedError extends SandboxError {
  readonly kind = 'command-failed';

  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly output: string
  ) {
    super(`Command failed with exit code ${exitCode}: ${command}${output ? `\n${output}` : ''}`);
  }
}

export interface AttachAttempt {
  method: string;
  detail: string;
}

export class AttachError extends SandboxError {
  readonly kind = 'attach';

  constructor(readonly attempts: AttachAttempt[]) {
    super(
      'Could not attach to the VM console. Tried:\n' +
        attempts.map((a) => `  - ${a.method}: ${a.detail}`).join('\n')
    );
  }
}

/** Another operation holds the sandbox; only raised by the HTTP API */
export class SandboxBusyError extends SandboxError {
  readonly kind = 'busy';

  constructor(readonly running: string) {
    super(`Another sandbox operation is in progress: ${running}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
