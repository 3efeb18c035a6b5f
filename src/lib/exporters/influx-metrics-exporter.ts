import { Point } from '@influxdata/influxdb-client';
import type { WriteApi } from '@influxdata/influxdb-client';
import type { InfluxClient } from '@/lib/clients/influxdb-client';
import type { DeltaRecord, MountSnapshot } from '@/types/nfs';

/**
 * Receives each poll cycle's results for one mount
 */
export interface MetricsExporter {
  exportMount(mount: MountSnapshot, records: DeltaRecord[], timestamp: Date): Promise<void>;
  close(): Promise<void>;
}

/** The part of the InfluxDB write API the exporter relies on */
export type PointWriter = Pick<WriteApi, 'writePoints' | 'flush' | 'close'>;

/**
 * Writes NFS statistics to InfluxDB.
 *
 * Data model:
 *   nfs_op     tags host, mount, server, operation; per-interval rates and deltas
 *   nfs_mount  tags host, mount, server; age and cumulative byte counters
 *   nfs_events tags host, mount, server; cumulative VFS event counters
 */
export class InfluxMetricsExporter implements MetricsExporter {
  constructor(
    private readonly writeApi: PointWriter,
    private readonly hostName: string,
  ) {}

  async exportMount(mount: MountSnapshot, records: DeltaRecord[], timestamp: Date): Promise<void> {
    const points = [
      ...records.map(record => this.operationPoint(mount, record, timestamp)),
      this.mountPoint(mount, timestamp),
    ];

    const eventsPoint = this.eventsPoint(mount, timestamp);
    if (eventsPoint) points.push(eventsPoint);

    try {
      this.writeApi.writePoints(points);
      await this.writeApi.flush();
    } catch (err) {
      console.error('[InfluxMetricsExporter] Failed to write points:', err);
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.writeApi.close();
  }

  operationPoint(mount: MountSnapshot, record: DeltaRecord, timestamp: Date): Point {
    return this.tagged(new Point('nfs_op'), mount)
      .tag('operation', record.operation)
      .floatField('ops_per_sec', record.opsPerSec)
      .floatField('avg_rtt_ms', record.avgRtt)
      .floatField('avg_exec_ms', record.avgExec)
      .floatField('avg_queue_ms', record.avgQueue)
      .floatField('kb_per_sec', record.kbPerSec)
      .floatField('kb_per_op', record.kbPerOp)
      .intField('delta_ops', record.deltaOps)
      .intField('delta_bytes', record.deltaBytes)
      .intField('delta_errors', record.deltaErrors)
      .intField('delta_retrans', record.deltaRetrans)
      .timestamp(timestamp);
  }

  mountPoint(mount: MountSnapshot, timestamp: Date): Point {
    return this.tagged(new Point('nfs_mount'), mount)
      .intField('age_seconds', mount.age)
      .intField('bytes_read', mount.bytesRead)
      .intField('bytes_written', mount.bytesWrite)
      .timestamp(timestamp);
  }

  eventsPoint(mount: MountSnapshot, timestamp: Date): Point | null {
    if (!mount.events) return null;

    const point = this.tagged(new Point('nfs_events'), mount);
    for (const [field, value] of Object.entries(mount.events)) {
      point.intField(field, value);
    }
    return point.timestamp(timestamp);
  }

  private tagged(point: Point, mount: MountSnapshot): Point {
    return point
      .tag('host', this.hostName)
      .tag('mount', mount.mountPoint)
      .tag('server', mount.server);
  }
}

/**
 * Create an exporter writing through a connected InfluxDB client
 */
export function createInfluxMetricsExporter(client: InfluxClient, hostName: string): InfluxMetricsExporter {
  const writeApi = client.getClient().getWriteApi(client.getOrg(), client.getBucket(), 'ms', {
    batchSize: 500,
    flushInterval: 0,
    maxRetries: 3,
    retryJitter: 200,
  });
  return new InfluxMetricsExporter(writeApi, hostName);
}
