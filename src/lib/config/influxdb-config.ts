import { z } from 'zod';

const InfluxDBConfigSchema = z.object({
  url: z.string().url(),
  token: z.string().min(1),
  org: z.string().min(1),
  bucket: z.string().min(1),
});

export type InfluxDBConfig = z.infer<typeof InfluxDBConfigSchema>;

/**
 * Load InfluxDB export configuration from environment variables.
 * Export is optional: without INFLUXDB_URL and INFLUXDB_TOKEN it stays off.
 *
 * @returns Validated InfluxDB configuration, or null when export is disabled
 * @throws {z.ZodError} If configuration is invalid
 */
export function loadInfluxDBConfig(): InfluxDBConfig | null {
  if (!process.env.INFLUXDB_URL || !process.env.INFLUXDB_TOKEN) {
    return null;
  }

  const config = {
    url: process.env.INFLUXDB_URL,
    token: process.env.INFLUXDB_TOKEN,
    org: process.env.INFLUXDB_ORG || 'nfs',
    bucket: process.env.INFLUXDB_BUCKET || 'nfs',
  };

  return InfluxDBConfigSchema.parse(config);
}
