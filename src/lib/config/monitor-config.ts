import { z } from 'zod';

export const DEFAULT_MOUNTSTATS_PATH = '/proc/self/mountstats';

const MonitorConfigSchema = z.object({
  mountPoint: z.string().min(1).optional(),
  operations: z.string().optional(),
  interval: z.number().int().min(1).max(3600),
  count: z.number().int().min(0),
  showAttr: z.boolean(),
  showBandwidth: z.boolean(),
  nfsiostat: z.boolean(),
  clearScreen: z.boolean(),
  mountstatsPath: z.string().min(1),
  debugLogging: z.boolean(),
});

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

/**
 * Values given on the command line. Flags are only set when passed;
 * interval and count stay strings until validation.
 */
export interface MonitorCliOptions {
  mountPoint?: string;
  operations?: string;
  interval?: string;
  count?: string;
  showAttr?: boolean;
  showBandwidth?: boolean;
  nfsiostat?: boolean;
  clearScreen?: boolean;
  mountstatsPath?: string;
  debugLogging?: boolean;
}

/**
 * Load monitor configuration from environment variables, overridden by
 * command-line options
 *
 * @param cli - Options parsed from argv
 * @returns Validated monitor configuration
 * @throws {z.ZodError} If configuration is invalid
 */
export function loadMonitorConfig(cli: MonitorCliOptions = {}): MonitorConfig {
  const config = {
    mountPoint: cli.mountPoint ?? (process.env.NFS_IOSTAT_MOUNT || undefined),
    operations: cli.operations ?? (process.env.NFS_IOSTAT_OPS || undefined),
    interval: parseInt(cli.interval ?? (process.env.NFS_IOSTAT_INTERVAL || '1'), 10),
    count: parseInt(cli.count ?? (process.env.NFS_IOSTAT_COUNT || '0'), 10),
    showAttr: cli.showAttr ?? false,
    showBandwidth: cli.showBandwidth ?? false,
    nfsiostat: cli.nfsiostat ?? false,
    clearScreen: cli.clearScreen ?? false,
    mountstatsPath: cli.mountstatsPath ?? (process.env.NFS_IOSTAT_MOUNTSTATS || DEFAULT_MOUNTSTATS_PATH),
    debugLogging: cli.debugLogging ?? process.env.NFS_IOSTAT_DEBUG === 'true',
  };

  return MonitorConfigSchema.parse(config);
}
