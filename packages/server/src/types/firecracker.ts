/**
 * Firecracker Type Definitions
 * Control-plane request bodies and the boot configuration file format
 */

import { z } from 'zod';

// ============================================================================
// Boot Configuration (the --config-file document)
// ============================================================================

export const BootSourceSchema = z.object({
  kernel_image_path: z.string().min(1),
  boot_args: z.string().optional(),
  initrd_path: z.string().optional(),
});

export const DriveSchema = z.object({
  drive_id: z.string().min(1),
  path_on_host: z.string().min(1),
  is_root_device: z.boolean(),
  is_read_only: z.boolean().default(false),
});

export const MachineConfigSchema = z.object({
  vcpu_count: z.number().int().min(1).max(32),
  mem_size_mib: z.number().int().min(128),
  smt: z.boolean().optional(),
  track_dirty_pages: z.boolean().optional(),
});

export const NetworkInterfaceSchema = z.object({
  iface_id: z.string().min(1),
  host_dev_name: z.string().min(1),
  guest_mac: z.string().optional(),
});

/**
 * Firecracker boot configuration. Unknown sections (logger, metrics, vsock...)
 * are kept as-is so the copy stored with a snapshot stays complete.
 */
export const BootConfigSchema = z
  .object({
    'boot-source': BootSourceSchema,
    drives: z.array(DriveSchema).min(1),
    'machine-config': MachineConfigSchema,
    'network-interfaces': z.array(NetworkInterfaceSchema).optional(),
  })
  .passthrough();

export type BootSource = z.infer<typeof BootSourceSchema>;
export type Drive = z.infer<typeof DriveSchema>;
export type MachineConfig = z.infer<typeof MachineConfigSchema>;
export type NetworkInterface = z.infer<typeof NetworkInterfaceSchema>;
export type BootConfig = z.infer<typeof BootConfigSchema>;

// ============================================================================
// Firecracker API Types
// ============================================================================

/**
 * VM state (for pause/resume)
 */
export type VmStateRequest = 'Paused' | 'Resumed';

/**
 * Snapshot creation request
 */
export interface SnapshotCreateParams {
  mem_file_path: string;
  snapshot_path: string;
  snapshot_type?: 'Full' | 'Diff';
}

/**
 * Memory backend for snapshot loading
 */
export interface MemoryBackend {
  backend_type: 'File' | 'Uffd';
  backend_path: string;
}

/**
 * Snapshot load request
 */
export interface SnapshotLoadParams {
  snapshot_path: string;
  mem_backend: MemoryBackend;
  enable_diff_snapshots?: boolean;
  resume_vm?: boolean;
}

/**
 * Instance info response (GET /)
 */
export interface InstanceInfo {
  id: string;
  state: 'Not started' | 'Running' | 'Paused';
  vmm_version: string;
  app_name: string;
}
