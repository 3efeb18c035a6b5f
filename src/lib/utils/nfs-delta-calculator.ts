import type { DeltaRecord, MountSnapshot, OperationCounters } from '@/types/nfs';

function zeroCounters(name: string): OperationCounters {
  return {
    name,
    ops: 0,
    ntrans: 0,
    timeouts: 0,
    bytesSent: 0,
    bytesRecv: 0,
    queueTime: 0,
    rtt: 0,
    executeTime: 0,
    errors: 0,
  };
}

/**
 * Difference between two cumulative readings of one operation.
 * Deltas are not clamped: a remount resets the counters and shows up as a
 * negative value, which callers may choose to hide.
 */
export function calculateOperationDelta(
  previous: OperationCounters,
  current: OperationCounters,
  elapsedSeconds: number,
): DeltaRecord {
  const deltaOps = current.ops - previous.ops;
  const deltaSent = current.bytesSent - previous.bytesSent;
  const deltaRecv = current.bytesRecv - previous.bytesRecv;
  const deltaBytes = deltaSent + deltaRecv;
  const deltaRtt = current.rtt - previous.rtt;
  const deltaExec = current.executeTime - previous.executeTime;
  const deltaQueue = current.queueTime - previous.queueTime;
  const deltaErrors = current.errors - previous.errors;
  const deltaRetrans = current.timeouts - previous.timeouts;

  const hasOps = deltaOps > 0;
  const hasElapsed = elapsedSeconds > 0;
  const deltaKB = deltaBytes / 1024;

  return {
    operation: current.name,
    deltaOps,
    deltaBytes,
    deltaSent,
    deltaRecv,
    deltaRtt,
    deltaExec,
    deltaQueue,
    deltaErrors,
    deltaRetrans,
    avgRtt: hasOps ? deltaRtt / deltaOps : 0,
    avgExec: hasOps ? deltaExec / deltaOps : 0,
    avgQueue: hasOps ? deltaQueue / deltaOps : 0,
    kbPerOp: hasOps ? deltaKB / deltaOps : 0,
    kbPerSec: hasElapsed ? deltaKB / elapsedSeconds : 0,
    opsPerSec: hasElapsed ? deltaOps / elapsedSeconds : 0,
  };
}

/**
 * Per-operation activity between two snapshots of the same mount.
 *
 * Operations missing from `previous` are compared against zero. Operations
 * without new ops in the interval are left out. Sorted by operation name.
 *
 * @param previous - Earlier snapshot of the mount
 * @param current - Later snapshot of the same mount
 * @param elapsedSeconds - Wall-clock time between the two reads
 */
export function calculateDeltaStats(
  previous: MountSnapshot,
  current: MountSnapshot,
  elapsedSeconds: number,
): DeltaRecord[] {
  const deltas: DeltaRecord[] = [];

  for (const [name, currentOp] of current.operations) {
    const previousOp = previous.operations.get(name) ?? zeroCounters(name);
    const delta = calculateOperationDelta(previousOp, currentOp, elapsedSeconds);
    if (delta.deltaOps > 0) {
      deltas.push(delta);
    }
  }

  return deltas.sort((a, b) => (a.operation < b.operation ? -1 : a.operation > b.operation ? 1 : 0));
}
