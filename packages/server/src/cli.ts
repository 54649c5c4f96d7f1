#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type ConfigOverrides } from './services/config.js';
import { LifecycleOrchestrator } from './services/orchestrator.js';
import { startServer } from './server.js';
import type { NetworkInfo, SandboxConfig, SnapshotSummary, VmProcessInfo, VmStatus } from './types/sandbox.js';
import { SandboxError, describeError } from './utils/errors.js';

type GlobalOptions = {
  readonly socket?: string;
  readonly device?: string;
  readonly hostIp?: string;
  readonly guestIp?: string;
  readonly config?: string;
  readonly bootConfig?: string;
  readonly dryRun?: boolean;
  readonly verbose?: boolean;
};

type DetachOptions = {
  readonly detach?: boolean;
};

type SnapshotOptions = {
  readonly list?: boolean;
};

type ServeOptions = {
  readonly port?: string;
};

function loadCliConfig(command: Command, extra: ConfigOverrides = {}): Promise<Readonly<SandboxConfig>> {
  const options = command.optsWithGlobals<GlobalOptions>();
  return loadConfig({
    configPath: options.config,
    overrides: {
      socketPath: options.socket,
      device: options.device,
      hostCidr: options.hostIp,
      guestIp: options.guestIp,
      bootConfigPath: options.bootConfig,
      dryRun: options.dryRun,
      verbose: options.verbose,
      ...extra,
    },
  });
}

async function createOrchestrator(command: Command): Promise<LifecycleOrchestrator> {
  return LifecycleOrchestrator.create(await loadCliConfig(command));
}

/**
 * Run one command; any error is printed and turns into exit code 1
 */
function action(
  handler: (sandbox: LifecycleOrchestrator, command: Command) => Promise<void>
): (...args: unknown[]) => Promise<void> {
  return async (...args) => {
    // commander passes the command itself last
    const command = args[args.length - 1];
    if (!(command instanceof Command)) return;

    try {
      const sandbox = await createOrchestrator(command);
      await handler(sandbox, command);
      reportDryRun(sandbox);
    } catch (error) {
      fail(error);
    }
  };
}

function fail(error: unknown): void {
  if (error instanceof SandboxError) {
    console.error(chalk.red(`Error: ${error.message}`));
  } else {
    console.error(chalk.red(`Unexpected error: ${describeError(error)}`));
  }
  process.exitCode = 1;
}

function reportDryRun(sandbox: LifecycleOrchestrator): void {
  if (!sandbox.config.dryRun) return;
  console.log(chalk.yellow(`\nDry run: ${sandbox.history.length} command(s) traced, nothing was changed`));
}

function printNetwork(info: NetworkInfo): void {
  const mark = (ok: boolean) => (ok ? chalk.green('yes') : chalk.red('no'));
  console.log(chalk.bold(`Network (${info.device})`));
  console.log(`  device exists:    ${mark(info.deviceExists)}`);
  console.log(`  host address:     ${info.hostCidr} (${info.addressAssigned ? 'assigned' : 'not assigned'})`);
  console.log(`  guest address:    ${info.guestIp}`);
  console.log(`  ip forwarding:    ${mark(info.ipForwarding)}`);
  console.log(`  uplink:           ${info.uplink ?? chalk.red('none')}`);
  for (const rule of info.rules) {
    console.log(`  ${rule.present ? chalk.green('+') : chalk.red('-')} ${rule.rule}`);
  }
}

function printVm(status: VmStatus, config: Readonly<SandboxConfig>): void {
  console.log(chalk.bold('VM'));
  if (status.running) {
    console.log(`  running:          ${chalk.green('yes')} (PID ${status.pids.join(', ')})`);
  } else {
    console.log(`  running:          ${chalk.red('no')}`);
  }
  console.log(`  tmux session:     ${status.session ?? 'none'}`);
  console.log(`  api socket:       ${config.socketPath} (${status.socketPresent ? 'present' : 'missing'})`);
}

function printVms(vms: VmProcessInfo[]): void {
  if (vms.length === 0) {
    console.log('No Firecracker VMs are running');
    return;
  }
  for (const vm of vms) {
    console.log(`${chalk.cyan(String(vm.pid))}  socket=${vm.socketPath ?? '-'}  config=${vm.configFile ?? '-'}`);
  }
}

function printSnapshots(snapshots: SnapshotSummary[]): void {
  if (snapshots.length === 0) {
    console.log('No snapshots');
    return;
  }
  for (const snapshot of snapshots) {
    const created = snapshot.createdAt ? `  created ${snapshot.createdAt}` : '';
    const pid = snapshot.sourcePid !== undefined ? `  from PID ${snapshot.sourcePid}` : '';
    console.log(`${chalk.cyan(snapshot.id)}${created}${pid}`);
  }
}

export function buildProgram(): Command {
  const program = new Command()
    .name('mvsandbox')
    .description('Set up, run, snapshot and restore a Firecracker microVM sandbox on this host')
    .option('--socket <path>', 'Firecracker API socket path')
    .option('--device <name>', 'tap device name')
    .option('--host-ip <cidr>', 'host address of the tap device, e.g. 192.168.1.1/24')
    .option('--guest-ip <ip>', 'guest address')
    .option('--config <file>', 'YAML config file (default: ./sandbox.yml when present)')
    .option('--boot-config <file>', 'Firecracker boot configuration JSON')
    .option('--dry-run', 'print the commands instead of running them')
    .option('--verbose', 'echo every command before running it');

  program
    .command('activate')
    .description('create the control socket placeholder')
    .action(action(async (sandbox) => {
      await sandbox.activate();
    }));

  program
    .command('deactivate')
    .description('remove the control socket')
    .action(action(async (sandbox) => {
      await sandbox.deactivate();
    }));

  program
    .command('net-up')
    .description('create the tap device and NAT rules')
    .action(action(async (sandbox) => {
      await sandbox.netUp();
    }));

  program
    .command('net-down')
    .description('remove the tap device and NAT rules')
    .action(action(async (sandbox) => {
      await sandbox.netDown();
    }));

  program
    .command('start')
    .description('start the VM (foreground unless --detach)')
    .option('--detach', 'run the VM in a tmux session')
    .action(action(async (sandbox, command) => {
      await sandbox.start({ detached: command.opts<DetachOptions>().detach === true });
    }));

  program
    .command('stop')
    .description('stop every running VM')
    .action(action(async (sandbox) => {
      await sandbox.stop();
    }));

  program
    .command('login')
    .description("attach this terminal to the VM's console")
    .action(action(async (sandbox) => {
      await sandbox.login();
    }));

  program
    .command('setup')
    .description('network up, socket activate, VM start')
    .option('--detach', 'run the VM in a tmux session')
    .action(action(async (sandbox, command) => {
      const result = await sandbox.setup({ detached: command.opts<DetachOptions>().detach === true });
      if (result.vm && result.vm.pid > 0) {
        console.log(chalk.green(`Sandbox is up: VM PID ${result.vm.pid}, uplink ${result.network.uplink}`));
      }
    }));

  program
    .command('teardown')
    .description('VM stop, network down, socket deactivate')
    .action(action(async (sandbox) => {
      await sandbox.teardown();
    }));

  program
    .command('restore')
    .description('replace the running VM with a snapshot')
    .argument('<id>', 'snapshot id, as listed by snapshot --list')
    .action(action(async (sandbox, command) => {
      const [id = ''] = command.args;
      const result = await sandbox.restore(id);
      if (result.vm.pid > 0) {
        console.log(chalk.green(`Restored ${result.snapshot.id}: VM PID ${result.vm.pid}`));
      }
    }));

  program
    .command('snapshot')
    .description('snapshot the running VM')
    .option('--list', 'list existing snapshots instead')
    .action(action(async (sandbox, command) => {
      if (command.opts<SnapshotOptions>().list === true) {
        printSnapshots(await sandbox.listSnapshots());
        return;
      }
      const record = await sandbox.snapshot();
      console.log(chalk.green(`Snapshot ${record.id} created in ${record.dir}`));
    }));

  program
    .command('list-vms')
    .description('list running Firecracker processes')
    .action(action(async (sandbox) => {
      printVms(await sandbox.listVms());
    }));

  program
    .command('net-info')
    .description('show the network configuration and NAT rules')
    .action(action(async (sandbox) => {
      printNetwork(await sandbox.netInfo());
    }));

  program
    .command('status')
    .description('show VM and network status')
    .action(action(async (sandbox) => {
      const status = await sandbox.status();
      printVm(status.vm, sandbox.config);
      printNetwork(status.network);
    }));

  program
    .command('serve')
    .description('expose the sandbox over a local HTTP API')
    .option('--port <port>', 'first port to try')
    .action(async (options: ServeOptions, command: Command) => {
      try {
        const port = options.port === undefined ? undefined : Number.parseInt(options.port, 10);
        const config = await loadCliConfig(command, port === undefined ? {} : { serverPort: port });
        await startServer(config, () => LifecycleOrchestrator.create(config));
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch(fail);
