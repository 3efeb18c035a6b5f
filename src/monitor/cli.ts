import { parseArgs } from 'node:util';
import type { MonitorCliOptions } from '@/lib/config/monitor-config';
import { DEFAULT_MOUNTSTATS_PATH } from '@/lib/config/monitor-config';

export const USAGE = `Usage: nfs-iostat [options] [mount-point]

NFS I/O statistics monitor. Reads ${DEFAULT_MOUNTSTATS_PATH} and prints
per-operation rates, latencies and bandwidth for each NFS mount.

Options:
  -m, --mount-point <path>  Mount point to monitor (default: all NFS mounts)
      --ops <list>          Comma-separated operations to show, e.g. READ,WRITE
  -i, --interval <secs>     Seconds between reports (default: 1)
  -c, --count <n>           Number of reports, 0 = until interrupted (default: 0)
      --attr                Show attribute cache statistics (with --nfsiostat)
      --bw                  Show bandwidth columns
      --nfsiostat           Use the nfsiostat(8) layout
      --clear               Clear the screen between reports
  -f, --file <path>         Mountstats file (default: ${DEFAULT_MOUNTSTATS_PATH})
      --debug               Verbose logging
  -h, --help                Show this help

Environment:
  NFS_IOSTAT_MOUNT, NFS_IOSTAT_OPS, NFS_IOSTAT_INTERVAL, NFS_IOSTAT_COUNT,
  NFS_IOSTAT_MOUNTSTATS, NFS_IOSTAT_DEBUG
  NFS_SSH_HOST, NFS_SSH_PORT, NFS_SSH_USER, NFS_SSH_PASSWORD, NFS_SSH_KEY_PATH
                            Read the report of a remote host over SSH
  INFLUXDB_URL, INFLUXDB_TOKEN, INFLUXDB_ORG, INFLUXDB_BUCKET
                            Also write the statistics to InfluxDB

Examples:
  nfs-iostat /mnt/nfs --nfsiostat --attr
  nfs-iostat -m /mnt/nfs --ops READ,WRITE --bw
  nfs-iostat -i 5 -c 12 --clear
`;

export interface ParsedCli {
  help: boolean;
  options: MonitorCliOptions;
}

/**
 * Parse command-line arguments. Values stay unvalidated until
 * `loadMonitorConfig` merges them with the environment.
 *
 * @throws {TypeError} On unknown options or a missing option value
 */
export function parseCliArgs(argv: string[]): ParsedCli {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'mount-point': { type: 'string', short: 'm' },
      ops: { type: 'string' },
      interval: { type: 'string', short: 'i' },
      count: { type: 'string', short: 'c' },
      attr: { type: 'boolean' },
      bw: { type: 'boolean' },
      nfsiostat: { type: 'boolean' },
      clear: { type: 'boolean' },
      file: { type: 'string', short: 'f' },
      debug: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  return {
    help: values.help ?? false,
    options: {
      mountPoint: values['mount-point'] ?? positionals[0],
      operations: values.ops,
      interval: values.interval,
      count: values.count,
      showAttr: values.attr,
      showBandwidth: values.bw,
      nfsiostat: values.nfsiostat,
      clearScreen: values.clear,
      mountstatsPath: values.file,
      debugLogging: values.debug,
    },
  };
}
