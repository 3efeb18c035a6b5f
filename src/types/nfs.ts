/**
 * NFS mount statistics types
 */

/**
 * Cumulative counters for one RPC operation on one mount
 * (one `<OPNAME>: ...` line of /proc/self/mountstats)
 */
export interface OperationCounters {
  /** Operation name, e.g. READ, GETATTR */
  name: string;

  ops: number;
  /** Transmissions, including retransmits */
  ntrans: number;
  timeouts: number;
  bytesSent: number;
  bytesRecv: number;

  /** Cumulative times in milliseconds */
  queueTime: number;
  rtt: number;
  executeTime: number;

  /** Absent on older kernels, parsed as 0 */
  errors: number;
}

/**
 * Per-mount VFS event counters, in the order the `events:` line lists them
 */
export interface EventCounters {
  inodeRevalidate: number;
  dentryRevalidate: number;
  dataInvalidate: number;
  attrInvalidate: number;
  vfsOpen: number;
  vfsLookup: number;
  vfsAccess: number;
  vfsUpdatePage: number;
  vfsReadPage: number;
  vfsReadPages: number;
  vfsWritePage: number;
  vfsWritePages: number;
  vfsGetdents: number;
  vfsSetattr: number;
  vfsFlush: number;
  vfsFsync: number;
  vfsLock: number;
  vfsRelease: number;
  congestionWait: number;
  setattrTrunc: number;
  extendWrite: number;
  sillyRename: number;
  shortRead: number;
  shortWrite: number;
  delay: number;
  /** pNFS counters, only on newer statvers (0 otherwise) */
  pnfsRead: number;
  pnfsWrite: number;
}

/**
 * One NFS mount at one point in time
 */
export interface MountSnapshot {
  /** `server:/export` as printed in the device header */
  device: string;
  mountPoint: string;
  server: string;
  export: string;

  /** Seconds since the mount was created */
  age: number;

  operations: Map<string, OperationCounters>;

  /** Undefined when the report had no events line for this mount */
  events?: EventCounters;

  bytesRead: number;
  bytesWrite: number;
}

/** Parsed report, keyed by mount point */
export type MountSnapshotMap = Map<string, MountSnapshot>;

/**
 * Per-operation activity between two snapshots of the same mount
 */
export interface DeltaRecord {
  operation: string;

  deltaOps: number;
  /** deltaSent + deltaRecv */
  deltaBytes: number;
  deltaSent: number;
  deltaRecv: number;
  deltaRtt: number;
  deltaExec: number;
  deltaQueue: number;
  deltaErrors: number;
  /** Timeouts delta (reported as retrans) */
  deltaRetrans: number;

  /** Per-op averages in milliseconds */
  avgRtt: number;
  avgExec: number;
  avgQueue: number;

  kbPerOp: number;
  kbPerSec: number;
  opsPerSec: number;
}
