import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { SandboxConfig } from '../types/sandbox.js';
import { ConfigurationError, describeError } from '../utils/errors.js';

export const DEFAULT_CONFIG_FILE = 'sandbox.yml';

export const DEFAULT_CONFIG: SandboxConfig = {
  dryRun: false,
  verbose: false,
  socketPath: '/tmp/firecracker.socket',
  socketMode: '660',
  device: 'tap0',
  hostCidr: '192.168.1.1/24',
  guestIp: '192.168.1.2',
  bootConfigPath: 'vm-config.json',
  snapshotsDir: 'snapshots',
  firecrackerBinary: 'firecracker',
  sessionName: 'firecracker',
  logPath: '/tmp/firecracker-console.log',
  consoleSocketPath: '/tmp/firecracker-console.sock',
  natChain: 'FIRECRACKER-NAT',
  forwardChain: 'FIRECRACKER-FORWARD',
  startTimeoutMs: 5000,
  stopTimeoutMs: 5000,
  pollIntervalMs: 500,
  serverPort: 4010,
};

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

const ipv4 = z.string().regex(IPV4, 'must be an IPv4 address');
const cidr = z
  .string()
  .refine((value) => {
    const [address, prefix, extra] = value.split('/');
    const bits = Number(prefix);
    return extra === undefined && IPV4.test(address) && Number.isInteger(bits) && bits >= 1 && bits <= 30;
  }, 'must be an IPv4 address with a /1-/30 prefix');

// Linux limits interface names to 15 characters
const deviceName = z.string().regex(/^[A-Za-z0-9_.-]{1,15}$/, 'must be a valid interface name');
const chainName = z.string().regex(/^[A-Za-z0-9_-]{1,28}$/, 'must be a valid iptables chain name');

export const SandboxConfigSchema = z.object({
  dryRun: z.boolean(),
  verbose: z.boolean(),
  socketPath: z.string().min(1),
  socketMode: z.string().regex(/^[0-7]{3,4}$/, 'must be an octal mode'),
  device: deviceName,
  hostCidr: cidr,
  guestIp: ipv4,
  bootConfigPath: z.string().min(1),
  snapshotsDir: z.string().min(1),
  firecrackerBinary: z.string().min(1),
  sessionName: z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be a valid tmux session name'),
  logPath: z.string().min(1),
  consoleSocketPath: z.string().min(1),
  natChain: chainName,
  forwardChain: chainName,
  startTimeoutMs: z.number().int().min(0),
  stopTimeoutMs: z.number().int().min(0),
  pollIntervalMs: z.number().int().min(0),
  serverPort: z.number().int().min(1).max(65535),
});

/** Keys allowed in the YAML file; invocation flags stay on the command line */
export const ConfigFileSchema = SandboxConfigSchema.omit({ dryRun: true, verbose: true }).partial().strict();

export type ConfigOverrides = Partial<SandboxConfig>;

export interface LoadConfigOptions {
  /** Explicit config file; missing is an error. Without it sandbox.yml is used if present. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  cwd?: string;
}

const ENV_KEYS: Record<string, keyof SandboxConfig> = {
  MVSANDBOX_SOCKET: 'socketPath',
  MVSANDBOX_DEVICE: 'device',
  MVSANDBOX_HOST_IP: 'hostCidr',
  MVSANDBOX_GUEST_IP: 'guestIp',
  MVSANDBOX_BOOT_CONFIG: 'bootConfigPath',
  MVSANDBOX_SNAPSHOTS_DIR: 'snapshotsDir',
  MVSANDBOX_FIRECRACKER: 'firecrackerBinary',
  MVSANDBOX_DRY_RUN: 'dryRun',
  MVSANDBOX_VERBOSE: 'verbose',
  MVSANDBOX_PORT: 'serverPort',
};

/**
 * Build the invocation config: defaults, then the YAML file, then the
 * environment, then CLI overrides. The result is validated and frozen.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Readonly<SandboxConfig>> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.MVSANDBOX_CONFIG;

  const fromFile = await readConfigFile(configPath ? resolve(cwd, configPath) : resolve(cwd, DEFAULT_CONFIG_FILE), Boolean(configPath));
  const fromEnv = readEnv(env);

  const merged = normalize({
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...fromEnv,
    ...stripUndefined(options.overrides ?? {}),
  });

  const parsed = SandboxConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  checkGuestAddress(parsed.data.hostCidr, parsed.data.guestIp);
  return Object.freeze(parsed.data);
}

async function readConfigFile(path: string, required: boolean): Promise<ConfigOverrides> {
  if (!existsSync(path)) {
    if (required) {
      throw new ConfigurationError(`Config file ${path} not found`);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = parseYaml(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${path}: ${describeError(error)}`);
  }

  if (raw === null || raw === undefined) return {};

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string | number | boolean> {
  const values: Record<string, string | number | boolean> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    if (key === 'dryRun' || key === 'verbose') {
      values[key] = value === '1' || value.toLowerCase() === 'true';
    } else if (key === 'serverPort') {
      values[key] = Number(value);
    } else {
      values[key] = value;
    }
  }
  return values;
}

/**
 * A bare host address gets the default /24 prefix
 */
function normalize(config: Record<string, unknown>): Record<string, unknown> {
  const hostCidr = config.hostCidr;
  if (typeof hostCidr === 'string' && !hostCidr.includes('/')) {
    return { ...config, hostCidr: `${hostCidr}/24` };
  }
  return config;
}

function stripUndefined(values: ConfigOverrides): ConfigOverrides {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ');
}

/**
 * The guest must sit in the host's subnet and not reuse the host address
 */
export function checkGuestAddress(hostCidr: string, guestIp: string): void {
  const [hostIp, prefix] = hostCidr.split('/');
  const bits = Number(prefix);
  const mask = bits === 0 ? 0 : (~0 << (32 - bits)) >>> 0;

  if (guestIp === hostIp) {
    throw new ConfigurationError(`Guest IP ${guestIp} is the host address`);
  }
  if (((ipv4ToInt(hostIp) & mask) >>> 0) !== ((ipv4ToInt(guestIp) & mask) >>> 0)) {
    throw new ConfigurationError(`Guest IP ${guestIp} is outside ${hostCidr}`);
  }
}

function ipv4ToInt(address: string): number {
  return address.split('.').reduce((acc, octet) => ((acc << 8) | Number(octet)) >>> 0, 0);
}
