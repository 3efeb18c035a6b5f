import {
  formatBandwidth,
  formatBytes,
  formatDuration,
  formatRate,
  formatShare,
} from '@/formatters/metrics';
import type { DeltaRecord, MountSnapshot } from '@/types/nfs';

/** Anything text can be written to (process.stdout, a test buffer) */
export interface TextWriter {
  write(text: string): unknown;
}

/** Clear the terminal and home the cursor */
export const CLEAR_SCREEN = '\x1B[2J\x1B[1;1H';

const OP_WIDTH = 12;
const COLUMN_WIDTH = 8;
const NFSIOSTAT_COLUMN_WIDTH = 16;

function row(op: string, columns: string[], width = COLUMN_WIDTH): string {
  return [op.padEnd(OP_WIDTH), ...columns.map(c => c.padStart(width))].join(' ');
}

/**
 * Format a timestamp as "YYYY-MM-DD HH:MM:SS UTC"
 */
export function formatTimestamp(timestamp: Date): string {
  const iso = timestamp.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/**
 * Print the deltas of one mount as a compact table.
 * Writes nothing when there was no activity.
 */
export function renderSimpleStats(
  writer: TextWriter,
  mount: MountSnapshot,
  records: DeltaRecord[],
  showBandwidth: boolean,
  timestamp: Date,
): void {
  if (records.length === 0) return;

  const lines: string[] = [
    `${mount.device} mounted on ${mount.mountPoint}`,
    `Timestamp: ${formatTimestamp(timestamp)}`,
    '',
  ];

  if (showBandwidth) {
    lines.push(row('OP', ['IOPS', 'RTT(ms)', 'EXE(ms)', 'MB/s', 'KB/op', 'ERRORS']));
    lines.push('-'.repeat(72));
  } else {
    lines.push(row('OP', ['IOPS', 'RTT(ms)', 'EXE(ms)', 'ERRORS']));
    lines.push('-'.repeat(48));
  }

  for (const record of records) {
    const columns = [
      formatRate(record.opsPerSec),
      formatDuration(record.avgRtt),
      formatDuration(record.avgExec),
    ];
    if (showBandwidth) {
      columns.push(formatBandwidth(record.kbPerSec), formatRate(record.kbPerOp));
    }
    columns.push(String(record.deltaErrors));
    lines.push(row(record.operation, columns));
  }

  lines.push('');
  writer.write(lines.map(line => `${line}\n`).join(''));
}

/**
 * Print the deltas of one mount in the layout of nfsiostat(8).
 * With `showAttr`, also prints cache revalidation activity when both
 * snapshots carry an events line.
 */
export function renderNfsiostatStats(
  writer: TextWriter,
  mount: MountSnapshot,
  records: DeltaRecord[],
  previous: MountSnapshot | undefined,
  showAttr: boolean,
): void {
  const totalOps = records.reduce((sum, record) => sum + record.opsPerSec, 0);
  const pad = (value: string) => value.padStart(NFSIOSTAT_COLUMN_WIDTH);

  const lines: string[] = [
    '',
    `${mount.device} mounted on ${mount.mountPoint}:`,
    '',
    `${pad('ops/s')} ${pad('rpc bklog')}`,
    `${pad(totalOps.toFixed(3))} ${pad((0).toFixed(3))}`,
    '',
  ];

  const headers = ['ops/s', 'kB/s', 'kB/op', 'retrans', 'avg RTT (ms)', 'avg exe (ms)', 'avg queue (ms)', 'errors'];

  for (const record of records) {
    lines.push(row(`${record.operation.toLowerCase()}:`, headers, NFSIOSTAT_COLUMN_WIDTH));
    lines.push(row('', [
      record.opsPerSec.toFixed(3),
      record.kbPerSec.toFixed(3),
      record.kbPerOp.toFixed(3),
      `${record.deltaRetrans} (${formatShare(record.deltaRetrans, record.deltaOps)})`,
      record.avgRtt.toFixed(3),
      record.avgExec.toFixed(3),
      record.avgQueue.toFixed(3),
      `${record.deltaErrors} (${formatShare(record.deltaErrors, record.deltaOps)})`,
    ], NFSIOSTAT_COLUMN_WIDTH));
  }

  if (showAttr && previous?.events && mount.events) {
    const before = previous.events;
    const after = mount.events;
    lines.push('');
    lines.push(`${after.vfsOpen - before.vfsOpen} VFS opens`);
    lines.push(`${after.inodeRevalidate - before.inodeRevalidate} inoderevalidates (forced GETATTRs)`);
    lines.push(`${after.dataInvalidate - before.dataInvalidate} page cache invalidations`);
    lines.push(`${after.attrInvalidate - before.attrInvalidate} attribute cache invalidations`);
  }

  writer.write(lines.map(line => `${line}\n`).join(''));
}

/**
 * Print the banner listing what is being monitored
 */
export function renderInitialSummary(
  writer: TextWriter,
  mountPoint: string | undefined,
  mounts: MountSnapshot[],
  operationsFilter: ReadonlySet<string>,
): void {
  const lines: string[] = [
    'NFS I/O Statistics Monitor',
    '==========================',
    '',
  ];

  if (mountPoint) {
    lines.push(`Monitoring mount point: ${mountPoint}`);
  } else {
    lines.push(`Monitoring ${mounts.length} NFS mount(s):`);
    for (const mount of mounts) {
      lines.push(
        `  ${mount.device} -> ${mount.mountPoint}` +
        ` (read ${formatBytes(mount.bytesRead)}, written ${formatBytes(mount.bytesWrite)})`
      );
    }
  }

  if (operationsFilter.size > 0) {
    lines.push(`Filtering operations: ${[...operationsFilter].sort().join(', ')}`);
  }

  lines.push('');
  writer.write(lines.map(line => `${line}\n`).join(''));
}
