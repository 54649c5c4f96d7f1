import type { CommandRunner } from './command-runner.js';
import { BootConfigSchema, type BootConfig, type Drive } from '../types/firecracker.js';
import { ConfigurationError, describeError } from '../utils/errors.js';

/**
 * Read and validate a Firecracker boot configuration file
 */
export async function readBootConfig(runner: CommandRunner, path: string): Promise<BootConfig> {
  if (!(await runner.exists(path))) {
    throw new ConfigurationError(`Config file ${path} not found`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await runner.readFile(path));
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in config file ${path}: ${describeError(error)}`);
  }

  const parsed = BootConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid boot configuration ${path}: ${issues}`);
  }

  return parsed.data;
}

export function rootDrive(config: BootConfig): Drive {
  const drive = config.drives.find((d) => d.is_root_device);
  if (!drive) {
    throw new ConfigurationError('Boot configuration has no root drive');
  }
  return drive;
}
