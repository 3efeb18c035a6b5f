import { InfluxDB } from '@influxdata/influxdb-client';
import type { InfluxDBConfig } from '@/lib/config/influxdb-config';

/**
 * InfluxDB client wrapper for the metrics exporter.
 * `connect()` verifies credentials before the first poll so a bad token
 * fails at startup rather than on every write.
 */
export class InfluxClient {
  readonly id: string;
  private client: InfluxDB;

  constructor(private config: InfluxDBConfig) {
    this.id = `influxdb://${config.url}/${config.org}/${config.bucket}`;
    this.client = new InfluxDB({
      url: config.url,
      token: config.token,
    });
  }

  async connect(): Promise<void> {
    try {
      const queryApi = this.client.getQueryApi(this.config.org);
      await queryApi.collectRows('buckets()');
      console.log(`[InfluxClient] Connected to ${this.id}`);
    } catch (err) {
      console.error('[InfluxClient] Connection failed:', err);
      throw err;
    }
  }

  getClient(): InfluxDB {
    return this.client;
  }

  getOrg(): string {
    return this.config.org;
  }

  getBucket(): string {
    return this.config.bucket;
  }
}
