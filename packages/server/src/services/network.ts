/**
 * NetworkResource - tap device, host address, IP forwarding and NAT
 *
 * Every step is idempotent on its own: creation tolerates "already exists",
 * rules are checked (-C) before they are appended, and teardown tolerates
 * "not found" at every step. Only uplink resolution is fatal.
 */

import type { CommandRunner } from './command-runner.js';
import type { NetworkConfig, NetworkInfo, NetworkRuleStatus, NetworkState } from '../types/sandbox.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { shellJoin } from '../utils/shell.js';

type Table = 'nat' | 'filter';

interface FirewallRule {
  table: Table;
  chain: string;
  spec: string[];
}

const log = createLogger('Network');

export class NetworkResource {
  private runner: CommandRunner;

  constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  /**
   * Create and configure the tap device and its firewall rules
   */
  async bringUp(config: NetworkConfig): Promise<NetworkState> {
    const { device, hostCidr } = config;
    log.info(`Setting up networking on ${device}...`);

    await this.ip(['tuntap', 'add', 'dev', device, 'mode', 'tap'], true);
    await this.ip(['link', 'set', device, 'up']);
    await this.ip(['addr', 'add', hostCidr, 'dev', device], true);

    await this.runner.run('sysctl -w net.ipv4.ip_forward=1');

    const uplink = config.uplink ?? (await this.resolveUplink());
    log.info(`Using ${uplink} as uplink interface`);

    await this.iptables('nat', ['-N', config.natChain], true);
    for (const rule of this.natRules(config, uplink)) {
      await this.ensureRule(rule);
    }

    await this.iptables('filter', ['-N', config.forwardChain], true);
    for (const rule of this.forwardRules(config)) {
      await this.ensureRule(rule);
    }

    log.success(`Networking ready: ${device} ${hostCidr} -> guest ${config.guestIp} via ${uplink}`);
    return { device, hostCidr, guestIp: config.guestIp, uplink };
  }

  /**
   * Undo bringUp in reverse order. Safe on a partially configured or already
   * clean host.
   */
  async tearDown(config: NetworkConfig): Promise<void> {
    const { device, hostCidr } = config;
    log.info(`Cleaning up networking on ${device}...`);

    const forwardRules = this.forwardRules(config).reverse();
    for (const rule of forwardRules) {
      await this.iptables(rule.table, ['-D', rule.chain, ...rule.spec], true);
    }
    await this.iptables('filter', ['-F', config.forwardChain], true);
    await this.iptables('filter', ['-X', config.forwardChain], true);

    // The chain flush below removes the masquerade rule whatever the uplink was.
    const uplink = config.uplink ?? (await this.findUplink());
    const natRules = this.natRules(config, uplink).reverse();
    for (const rule of natRules) {
      if (rule.spec.includes('MASQUERADE') && !uplink) continue;
      await this.iptables(rule.table, ['-D', rule.chain, ...rule.spec], true);
    }
    await this.iptables('nat', ['-F', config.natChain], true);
    await this.iptables('nat', ['-X', config.natChain], true);

    await this.ip(['addr', 'del', hostCidr, 'dev', device], true);
    await this.ip(['link', 'set', device, 'down'], true);
    await this.ip(['link', 'delete', device], true);

    log.success('Networking cleanup complete');
  }

  /**
   * Interface named by the default route
   */
  async resolveUplink(): Promise<string> {
    const uplink = await this.findUplink();
    if (!uplink) {
      throw new ConfigurationError(
        'Could not determine the default route interface; NAT cannot be configured'
      );
    }
    return uplink;
  }

  /**
   * Report what is currently configured on the host
   */
  async inspect(config: NetworkConfig): Promise<NetworkInfo> {
    const { device } = config;
    const link = await this.runner.run(shellJoin(['ip', 'link', 'show', device]), { probe: true });

    let addressAssigned = false;
    if (link.succeeded) {
      const addr = await this.runner.run(shellJoin(['ip', 'addr', 'show', 'dev', device]), { probe: true });
      addressAssigned = addr.output.split('\n').some((line) => {
        const parts = line.trim().split(/\s+/);
        return parts[0] === 'inet' && parts[1] === config.hostCidr;
      });
    }

    const forwarding = await this.runner.run('sysctl -n net.ipv4.ip_forward', { probe: true });
    const uplink = config.uplink ?? (await this.findUplink());

    const rules = [...this.natRules(config, uplink), ...this.forwardRules(config)];
    const ruleStatus: NetworkRuleStatus[] = [];
    for (const rule of rules) {
      const present = uplink || !rule.spec.includes('MASQUERADE') ? await this.ruleExists(rule) : false;
      ruleStatus.push({ rule: describeRule(rule), present });
    }

    return {
      device,
      deviceExists: link.succeeded,
      addressAssigned,
      hostCidr: config.hostCidr,
      guestIp: config.guestIp,
      ipForwarding: forwarding.succeeded && forwarding.output.trim() === '1',
      uplink,
      rules: ruleStatus,
    };
  }

  private async findUplink(): Promise<string | null> {
    const result = await this.runner.run('ip route', { probe: true });
    if (!result.succeeded) return null;
    return parseDefaultRoute(result.output);
  }

  private natRules(config: NetworkConfig, uplink: string | null): FirewallRule[] {
    return [
      { table: 'nat', chain: config.natChain, spec: ['-o', uplink ?? '<uplink>', '-j', 'MASQUERADE'] },
      { table: 'nat', chain: 'POSTROUTING', spec: ['-j', config.natChain] },
    ];
  }

  private forwardRules(config: NetworkConfig): FirewallRule[] {
    return [
      { table: 'filter', chain: config.forwardChain, spec: ['-i', config.device, '-j', 'ACCEPT'] },
      { table: 'filter', chain: config.forwardChain, spec: ['-o', config.device, '-j', 'ACCEPT'] },
      { table: 'filter', chain: 'FORWARD', spec: ['-j', config.forwardChain] },
    ];
  }

  /**
   * Append a rule unless an identical one is already there
   */
  private async ensureRule(rule: FirewallRule): Promise<void> {
    if (await this.ruleExists(rule)) {
      if (this.runner.verbose) log.debug(`rule already present: ${describeRule(rule)}`);
      return;
    }
    await this.iptables(rule.table, ['-A', rule.chain, ...rule.spec]);
  }

  private async ruleExists(rule: FirewallRule): Promise<boolean> {
    const result = await this.runner.run(
      iptablesCommand(rule.table, ['-C', rule.chain, ...rule.spec]),
      { probe: true }
    );
    return result.succeeded;
  }

  private async ip(args: string[], allowFailure = false): Promise<void> {
    await this.runner.run(shellJoin(['ip', ...args]), { allowFailure });
  }

  private async iptables(table: Table, args: string[], allowFailure = false): Promise<void> {
    await this.runner.run(iptablesCommand(table, args), { allowFailure });
  }
}

function iptablesCommand(table: Table, args: string[]): string {
  return shellJoin(['iptables', ...(table === 'nat' ? ['-t', 'nat'] : []), ...args]);
}

function describeRule(rule: FirewallRule): string {
  return `${rule.table}/${rule.chain} ${rule.spec.join(' ')}`;
}

/**
 * Pick the device of the first "default" line of `ip route`
 */
export function parseDefaultRoute(output: string): string | null {
  for (const line of output.split('\n')) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] !== 'default') continue;
    const devIndex = parts.indexOf('dev');
    if (devIndex !== -1 && parts[devIndex + 1]) {
      return parts[devIndex + 1];
    }
  }
  return null;
}
