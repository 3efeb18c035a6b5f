import type {
  EventCounters,
  MountSnapshot,
  MountSnapshotMap,
  OperationCounters,
} from '@/types/nfs';
import { MountstatsParseError } from './parse-errors';

/** Positional layout of the `events:` line */
export const EVENT_FIELDS = [
  'inodeRevalidate',
  'dentryRevalidate',
  'dataInvalidate',
  'attrInvalidate',
  'vfsOpen',
  'vfsLookup',
  'vfsAccess',
  'vfsUpdatePage',
  'vfsReadPage',
  'vfsReadPages',
  'vfsWritePage',
  'vfsWritePages',
  'vfsGetdents',
  'vfsSetattr',
  'vfsFlush',
  'vfsFsync',
  'vfsLock',
  'vfsRelease',
  'congestionWait',
  'setattrTrunc',
  'extendWrite',
  'sillyRename',
  'shortRead',
  'shortWrite',
  'delay',
  'pnfsRead',
  'pnfsWrite',
] as const satisfies readonly (keyof EventCounters)[];

/** The pNFS counters at the end are optional */
export const REQUIRED_EVENT_FIELDS = 25;

type OperationCounterField = Exclude<keyof OperationCounters, 'name'>;

/** Positional layout of an `<OPNAME>:` line; `errors` is optional */
export const OPERATION_FIELDS = [
  'ops',
  'ntrans',
  'timeouts',
  'bytesSent',
  'bytesRecv',
  'queueTime',
  'rtt',
  'executeTime',
  'errors',
] as const satisfies readonly OperationCounterField[];

export const REQUIRED_OPERATION_FIELDS = 8;

/** Colon-bearing lines inside a mount block that are not per-op counters */
const NON_OPERATION_PREFIXES = ['RPC', 'xprt', 'per-op', 'opts', 'caps', 'sec', 'nfsv4', 'nfsv3'];

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parse a decimal integer token, rejecting anything parseInt would silently truncate
 */
function parseInteger(token: string | undefined, field: string, operation?: string): number {
  const label = operation ? `${operation}_${field}` : field;

  if (token === undefined || !INTEGER_PATTERN.test(token)) {
    throw new MountstatsParseError(
      `Error parsing ${label}: invalid integer ${JSON.stringify(token ?? '')}`,
      'field-parse',
      { field, operation },
    );
  }

  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    throw new MountstatsParseError(
      `Error parsing ${label}: ${token} is out of range`,
      'field-parse',
      { field, operation },
    );
  }
  return value;
}

function splitFields(text: string): string[] {
  const trimmed = text.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

function emptyEventCounters(): EventCounters {
  return {
    inodeRevalidate: 0,
    dentryRevalidate: 0,
    dataInvalidate: 0,
    attrInvalidate: 0,
    vfsOpen: 0,
    vfsLookup: 0,
    vfsAccess: 0,
    vfsUpdatePage: 0,
    vfsReadPage: 0,
    vfsReadPages: 0,
    vfsWritePage: 0,
    vfsWritePages: 0,
    vfsGetdents: 0,
    vfsSetattr: 0,
    vfsFlush: 0,
    vfsFsync: 0,
    vfsLock: 0,
    vfsRelease: 0,
    congestionWait: 0,
    setattrTrunc: 0,
    extendWrite: 0,
    sillyRename: 0,
    shortRead: 0,
    shortWrite: 0,
    delay: 0,
    pnfsRead: 0,
    pnfsWrite: 0,
  };
}

/**
 * Parse the counters following `events:`.
 * Requires 25 values; the 26th and 27th fill the pNFS counters when present.
 */
export function parseEvents(tokens: readonly string[]): EventCounters {
  if (tokens.length < REQUIRED_EVENT_FIELDS) {
    throw new MountstatsParseError(
      `Invalid number of parts for events: ${tokens.length}`,
      'malformed-section',
      { field: 'events' },
    );
  }

  const events = emptyEventCounters();
  EVENT_FIELDS.forEach((field, index) => {
    if (index < tokens.length) {
      events[field] = parseInteger(tokens[index], field);
    }
  });
  return events;
}

/**
 * Parse the counters following `<OPNAME>:`.
 * Requires 8 values; a 9th is the error count.
 */
export function parseOperation(name: string, tokens: readonly string[]): OperationCounters {
  if (tokens.length < REQUIRED_OPERATION_FIELDS) {
    throw new MountstatsParseError(
      `Insufficient stats for operation ${name}: got ${tokens.length}, need ${REQUIRED_OPERATION_FIELDS}`,
      'insufficient-tokens',
      { operation: name },
    );
  }

  const operation: OperationCounters = {
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

  OPERATION_FIELDS.forEach((field, index) => {
    if (index < tokens.length) {
      operation[field] = parseInteger(tokens[index], field, name);
    }
  });
  return operation;
}

/**
 * Split `server:/export` on the first colon. Devices without one export `/`.
 */
export function splitDevice(device: string): { server: string; export: string } {
  const colon = device.indexOf(':');
  if (colon < 0) {
    return { server: device, export: '/' };
  }
  return { server: device.slice(0, colon), export: device.slice(colon + 1) };
}

/**
 * Header of an NFS mount block, e.g.
 * `device server:/export mounted on /mnt/nfs with fstype nfs statvers=1.1`
 */
export function isDeviceHeader(line: string): boolean {
  return line.startsWith('device') && line.includes('nfs') && line.includes(' on ');
}

function isOperationLine(line: string): boolean {
  return line.includes(':') && !NON_OPERATION_PREFIXES.some(prefix => line.startsWith(prefix));
}

type ParserState =
  | { section: 'preamble' }
  | { section: 'mount'; mount: MountSnapshot };

type SectionHandler = (mount: MountSnapshot, line: string) => void;

/** Stat lines recognised by prefix, checked before the operation fallback */
const SECTION_HANDLERS: ReadonlyArray<{ prefix: string; handle: SectionHandler }> = [
  {
    prefix: 'age:',
    handle: (mount, line) => {
      const parts = splitFields(line);
      if (parts.length < 2) {
        throw new MountstatsParseError(`Invalid age line: ${line}`, 'malformed-section', { field: 'age' });
      }
      mount.age = parseInteger(parts[1], 'age');
    },
  },
  {
    prefix: 'events:',
    handle: (mount, line) => {
      mount.events = parseEvents(splitFields(line).slice(1));
    },
  },
  {
    prefix: 'bytes:',
    handle: (mount, line) => {
      const parts = splitFields(line);
      if (parts.length < 6) {
        throw new MountstatsParseError(`Invalid bytes line: ${line}`, 'malformed-section', { field: 'bytes' });
      }
      mount.bytesRead = parseInteger(parts[1], 'bytes_read');

      // statvers layouts disagree on where written bytes live: prefer index 6 unless it is "0"
      if (parts.length > 6 && parts[6] !== '0') {
        mount.bytesWrite = parseInteger(parts[6], 'bytes_write');
      } else if (parts.length > 5) {
        mount.bytesWrite = parseInteger(parts[5], 'bytes_write');
      } else {
        mount.bytesWrite = 0;
      }
    },
  },
];

/**
 * Line-oriented state machine over /proc/self/mountstats.
 * Mounts are registered under their path as soon as their header is seen
 * and filled in place by the lines that follow.
 */
export class MountstatsParser {
  private state: ParserState = { section: 'preamble' };
  private readonly mounts: MountSnapshotMap = new Map();

  /** Feed one raw (untrimmed) line of the report */
  parseLine(rawLine: string): void {
    const line = rawLine.trim();

    if (isDeviceHeader(line)) {
      this.openMount(line);
      return;
    }

    if (this.state.section === 'preamble') {
      return;
    }

    const { mount } = this.state;
    const handler = SECTION_HANDLERS.find(h => line.startsWith(h.prefix));
    if (handler) {
      handler.handle(mount, line);
    } else if (isOperationLine(line)) {
      this.parseOperationLine(mount, line);
    }
  }

  /** Return the mounts seen so far, keyed by mount point */
  finish(): MountSnapshotMap {
    return this.mounts;
  }

  private openMount(line: string): void {
    const separator = line.indexOf(' on ');
    const deviceInfo = splitFields(line.slice(0, separator));
    const mountInfo = splitFields(line.slice(separator + ' on '.length));

    if (deviceInfo.length < 2 || mountInfo.length === 0) {
      throw new MountstatsParseError(`Invalid device line: ${line}`, 'malformed-section', { field: 'device' });
    }

    const device = deviceInfo[1];
    const mountPoint = mountInfo[0];
    const mount: MountSnapshot = {
      device,
      mountPoint,
      ...splitDevice(device),
      age: 0,
      operations: new Map(),
      bytesRead: 0,
      bytesWrite: 0,
    };

    this.mounts.set(mountPoint, mount);
    this.state = { section: 'mount', mount };
  }

  private parseOperationLine(mount: MountSnapshot, line: string): void {
    const colon = line.indexOf(':');
    const name = line.slice(0, colon).trim();
    const operation = parseOperation(name, splitFields(line.slice(colon + 1)));
    mount.operations.set(name, operation);
  }
}

/**
 * Parse a full mountstats report.
 *
 * @param lines - Report lines, already split on newlines
 * @returns Mounts keyed by mount point
 * @throws {MountstatsParseError} If any recognised line is malformed
 */
export function parseMountstats(lines: Iterable<string>): MountSnapshotMap {
  const parser = new MountstatsParser();
  for (const line of lines) {
    parser.parseLine(line);
  }
  return parser.finish();
}

/** Parse a report held in a single string */
export function parseMountstatsText(text: string): MountSnapshotMap {
  return parseMountstats(text.split(/\r?\n/));
}
