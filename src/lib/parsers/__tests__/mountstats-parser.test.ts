import { readFileSync } from 'fs';
import { describe, it, expect } from 'vitest';
import {
  isDeviceHeader,
  MountstatsParser,
  parseEvents,
  parseMountstats,
  parseMountstatsText,
  parseOperation,
  splitDevice,
} from '../mountstats-parser';
import { MountstatsParseError } from '../parse-errors';

const fixture = readFileSync(new URL('./fixtures/mountstats.txt', import.meta.url), 'utf8');

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('parseMountstatsText', () => {
  const mounts = parseMountstatsText(fixture);

  it('should only keep NFS mounts keyed by mount point', () => {
    expect([...mounts.keys()]).toEqual(['/mnt/home', '/data']);
  });

  it('should parse the device header', () => {
    const home = mounts.get('/mnt/home');
    expect(home?.device).toBe('nas01:/export/home');
    expect(home?.mountPoint).toBe('/mnt/home');
    expect(home?.server).toBe('nas01');
    expect(home?.export).toBe('/export/home');
    expect(home?.age).toBe(86400);
  });

  it('should parse bytes read and written', () => {
    expect(mounts.get('/mnt/home')?.bytesRead).toBe(104857600);
    expect(mounts.get('/mnt/home')?.bytesWrite).toBe(52428800);
    expect(mounts.get('/data')?.bytesRead).toBe(2048);
    expect(mounts.get('/data')?.bytesWrite).toBe(4096);
  });

  it('should parse event counters including pNFS', () => {
    const events = mounts.get('/mnt/home')?.events;
    expect(events?.inodeRevalidate).toBe(5021);
    expect(events?.dentryRevalidate).toBe(120034);
    expect(events?.attrInvalidate).toBe(398);
    expect(events?.vfsOpen).toBe(2210);
    expect(events?.vfsRelease).toBe(2210);
    expect(events?.pnfsRead).toBe(7);
    expect(events?.pnfsWrite).toBe(3);
  });

  it('should leave events undefined when the block has none', () => {
    expect(mounts.get('/data')?.events).toBeUndefined();
  });

  it('should parse per-op counters and skip RPC/xprt/opts lines', () => {
    const home = mounts.get('/mnt/home');
    expect([...(home?.operations.keys() ?? [])]).toEqual(['NULL', 'READ', 'WRITE', 'GETATTR']);
    expect(home?.operations.get('WRITE')).toEqual({
      name: 'WRITE',
      ops: 800,
      ntrans: 802,
      timeouts: 2,
      bytesSent: 52532800,
      bytesRecv: 115200,
      queueTime: 400,
      rtt: 12000,
      executeTime: 13600,
      errors: 1,
    });
  });

  it('should default errors to 0 when an op line has 8 values', () => {
    expect(mounts.get('/mnt/home')?.operations.get('GETATTR')?.errors).toBe(0);
    expect(mounts.get('/mnt/home')?.operations.get('GETATTR')?.executeTime).toBe(3000);
  });

  it('should attach op lines to the most recent NFS mount', () => {
    expect(mounts.get('/data')?.operations.get('LOOKUP')?.ops).toBe(10);
    expect(mounts.get('/mnt/home')?.operations.has('LOOKUP')).toBe(false);
  });

  it('should accept CRLF line endings', () => {
    const text = 'device srv:/x mounted on /x with fstype nfs\r\n\tage:\t5\r\n';
    expect(parseMountstatsText(text).get('/x')?.age).toBe(5);
  });

  it('should yield equal results when parsing the same report twice', () => {
    expect(parseMountstatsText(fixture)).toEqual(mounts);
  });

  it('should return an empty map when no NFS mounts exist', () => {
    expect(parseMountstatsText('device proc mounted on /proc with fstype proc\n').size).toBe(0);
  });
});

describe('parseMountstats', () => {
  it('should ignore stat lines before the first NFS header', () => {
    const mounts = parseMountstats([
      'READ: x y z',
      'device srv:/x mounted on /x with fstype nfs4',
      'READ: 1 1 0 10 20 0 3 4',
    ]);
    expect(mounts.get('/x')?.operations.get('READ')?.rtt).toBe(3);
  });

  it('should let a repeated mount point replace the earlier block', () => {
    const mounts = parseMountstats([
      'device a:/one mounted on /m with fstype nfs',
      'age: 1',
      'device b:/two mounted on /m with fstype nfs',
      'age: 2',
    ]);
    expect(mounts.size).toBe(1);
    expect(mounts.get('/m')?.device).toBe('b:/two');
    expect(mounts.get('/m')?.age).toBe(2);
  });

  it('should prefer the seventh bytes token when it is non-zero', () => {
    const mounts = parseMountstats([
      'device srv:/x mounted on /x with fstype nfs',
      'bytes: 1048576 0 0 0 0 2097152 0 0',
    ]);
    expect(mounts.get('/x')?.bytesRead).toBe(1048576);
    expect(mounts.get('/x')?.bytesWrite).toBe(2097152);
  });

  it('should yield a zeroed mount for a header without stat lines', () => {
    const mounts = parseMountstats(['device srv:/x mounted on /x with fstype nfs']);
    expect(mounts.get('/x')).toEqual({
      device: 'srv:/x',
      mountPoint: '/x',
      server: 'srv',
      export: '/x',
      age: 0,
      operations: new Map(),
      bytesRead: 0,
      bytesWrite: 0,
    });
  });

  it('should read bytes written from index 5 when index 6 is zero', () => {
    const mounts = parseMountstats([
      'device srv:/x mounted on /x with fstype nfs',
      'bytes: 10 20 30 40 50 0 70',
    ]);
    expect(mounts.get('/x')?.bytesRead).toBe(10);
    expect(mounts.get('/x')?.bytesWrite).toBe(50);
  });

  it('should read bytes written from index 5 on a short bytes line', () => {
    const mounts = parseMountstats([
      'device srv:/x mounted on /x with fstype nfs',
      'bytes: 1 2 3 4 5',
    ]);
    expect(mounts.get('/x')?.bytesWrite).toBe(5);
  });

  it('should reject a bytes line with too few values', () => {
    const lines = ['device srv:/x mounted on /x with fstype nfs', 'bytes: 1 2 3'];
    expect(() => parseMountstats(lines)).toThrow('Invalid bytes line: bytes: 1 2 3');
  });

  it('should reject a non-integer age', () => {
    const lines = ['device srv:/x mounted on /x with fstype nfs', 'age: 12.5'];
    expect(() => parseMountstats(lines)).toThrow('Error parsing age: invalid integer "12.5"');
  });

  it('should reject an age line without a value', () => {
    const lines = ['device srv:/x mounted on /x with fstype nfs', 'age:'];
    expect(() => parseMountstats(lines)).toThrow('Invalid age line: age:');
  });

  it('should reject a header without a device name', () => {
    const err = captureError(() => parseMountstats(['device on /mnt with fstype nfs']));
    expect(err).toBeInstanceOf(MountstatsParseError);
    expect(err).toMatchObject({
      message: 'Invalid device line: device on /mnt with fstype nfs',
      kind: 'malformed-section',
      field: 'device',
    });
  });

  it('should fail the whole parse on a malformed op line', () => {
    const lines = [
      'device srv:/x mounted on /x with fstype nfs',
      'READ: 1 2 3',
    ];
    expect(() => parseMountstats(lines)).toThrow('Insufficient stats for operation READ: got 3, need 8');
  });

  it('should return no map when a later mount block is malformed', () => {
    const lines = [
      'device a:/one mounted on /mnt/a with fstype nfs',
      'READ: 1 1 0 10 20 0 3 4',
      'device b:/two mounted on /mnt/b with fstype nfs',
      'WRITE: 1 1 0 10 twenty 0 3 4',
    ];
    let mounts: unknown;
    const err = captureError(() => {
      mounts = parseMountstats(lines);
    });
    expect(mounts).toBeUndefined();
    expect(err).toMatchObject({
      message: 'Error parsing WRITE_bytesRecv: invalid integer "twenty"',
      kind: 'field-parse',
      field: 'bytesRecv',
      operation: 'WRITE',
    });
  });

  it('should name bytes_read when the bytes read value is not an integer', () => {
    const err = captureError(() => parseMountstats([
      'device srv:/x mounted on /x with fstype nfs',
      'bytes: abc 0 0 0 0 10',
    ]));
    expect(err).toBeInstanceOf(MountstatsParseError);
    expect(err).toMatchObject({
      message: 'Error parsing bytes_read: invalid integer "abc"',
      kind: 'field-parse',
      field: 'bytes_read',
    });
  });

  it('should name bytes_write when the seventh bytes token is not an integer', () => {
    const err = captureError(() => parseMountstats([
      'device srv:/x mounted on /x with fstype nfs',
      'bytes: 1 0 0 0 0 7x',
    ]));
    expect(err).toMatchObject({
      message: 'Error parsing bytes_write: invalid integer "7x"',
      kind: 'field-parse',
      field: 'bytes_write',
    });
  });

  it('should name bytes_write when the sixth bytes token is not an integer', () => {
    const err = captureError(() => parseMountstats([
      'device srv:/x mounted on /x with fstype nfs',
      'bytes: 1 0 0 0 zz',
    ]));
    expect(err).toMatchObject({
      message: 'Error parsing bytes_write: invalid integer "zz"',
      kind: 'field-parse',
      field: 'bytes_write',
    });
  });
});

describe('parseOperation', () => {
  it('should map tokens positionally', () => {
    expect(parseOperation('READ', '100 95 5 1024 2048 10 20 30 2'.split(' '))).toEqual({
      name: 'READ',
      ops: 100,
      ntrans: 95,
      timeouts: 5,
      bytesSent: 1024,
      bytesRecv: 2048,
      queueTime: 10,
      rtt: 20,
      executeTime: 30,
      errors: 2,
    });
  });

  it('should name the operation and field in parse errors', () => {
    const err = captureError(() => parseOperation('READ', ['1', 'x', '0', '0', '0', '0', '0', '0']));
    expect(err).toBeInstanceOf(MountstatsParseError);
    expect(err).toMatchObject({
      message: 'Error parsing READ_ntrans: invalid integer "x"',
      kind: 'field-parse',
      field: 'ntrans',
      operation: 'READ',
    });
  });

  it('should report insufficient tokens', () => {
    const err = captureError(() => parseOperation('COMMIT', []));
    expect(err).toMatchObject({ kind: 'insufficient-tokens', operation: 'COMMIT' });
  });

  it('should ignore values beyond the error count', () => {
    const op = parseOperation('READ', ['5', '5', '0', '100', '200', '1', '2', '3', '4', '99', '98']);
    expect(op.errors).toBe(4);
    expect(op.queueTime).toBe(1);
  });

  it('should reject integers beyond the safe range', () => {
    const tokens = ['99999999999999999999', '0', '0', '0', '0', '0', '0', '0'];
    expect(() => parseOperation('READ', tokens)).toThrow(
      'Error parsing READ_ops: 99999999999999999999 is out of range',
    );
  });
});

describe('parseEvents', () => {
  const tokens = Array.from({ length: 25 }, (_, i) => String(i + 1));

  it('should require 25 values', () => {
    const err = captureError(() => parseEvents(tokens.slice(0, 24)));
    expect(err).toMatchObject({
      message: 'Invalid number of parts for events: 24',
      kind: 'malformed-section',
      field: 'events',
    });
  });

  it('should leave pNFS counters at 0 when absent', () => {
    const events = parseEvents(tokens);
    expect(events.inodeRevalidate).toBe(1);
    expect(events.delay).toBe(25);
    expect(events.pnfsRead).toBe(0);
    expect(events.pnfsWrite).toBe(0);
  });

  it('should fill both pNFS counters from 27 values', () => {
    const events = parseEvents(Array.from({ length: 27 }, (_, i) => String(i + 1)));
    expect(events.inodeRevalidate).toBe(1);
    expect(events.pnfsWrite).toBe(27);
  });

  it('should name the event counter that is not an integer', () => {
    const bad = tokens.map((token, index) => (index === 4 ? 'x' : token));
    const err = captureError(() => parseEvents(bad));
    expect(err).toBeInstanceOf(MountstatsParseError);
    expect(err).toMatchObject({
      message: 'Error parsing vfsOpen: invalid integer "x"',
      kind: 'field-parse',
      field: 'vfsOpen',
    });
  });

  it('should fill the pNFS read counter from a 26th value', () => {
    expect(parseEvents([...tokens, '26']).pnfsRead).toBe(26);
  });
});

describe('splitDevice', () => {
  it('should split on the first colon', () => {
    expect(splitDevice('srv:/a:b')).toEqual({ server: 'srv', export: '/a:b' });
  });

  it('should default the export to / without a colon', () => {
    expect(splitDevice('nfsserver')).toEqual({ server: 'nfsserver', export: '/' });
  });
});

describe('isDeviceHeader', () => {
  it('should accept NFS device lines', () => {
    expect(isDeviceHeader('device srv:/x mounted on /x with fstype nfs4 statvers=1.1')).toBe(true);
  });

  it('should reject other filesystems and non-device lines', () => {
    expect(isDeviceHeader('device sysfs mounted on /sys with fstype sysfs')).toBe(false);
    expect(isDeviceHeader('opts: rw,vers=4.1')).toBe(false);
  });
});

describe('MountstatsParser', () => {
  it('should register a mount as soon as its header is seen', () => {
    const parser = new MountstatsParser();
    parser.parseLine('device srv:/x mounted on /x with fstype nfs');
    expect(parser.finish().get('/x')?.age).toBe(0);

    parser.parseLine('\tage:\t42');
    expect(parser.finish().get('/x')?.age).toBe(42);
  });
});
