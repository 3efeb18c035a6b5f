import { hostname } from 'os';
import { ZodError } from 'zod';
import { InfluxClient } from '@/lib/clients/influxdb-client';
import { loadInfluxDBConfig, type InfluxDBConfig } from '@/lib/config/influxdb-config';
import { loadMonitorConfig, type MonitorConfig } from '@/lib/config/monitor-config';
import { loadSSHSourceConfig, type SSHSourceConfig } from '@/lib/config/ssh-source-config';
import { renderInitialSummary } from '@/lib/display/stats-table';
import {
  createInfluxMetricsExporter,
  type MetricsExporter,
} from '@/lib/exporters/influx-metrics-exporter';
import { parseMountstats } from '@/lib/parsers/mountstats-parser';
import {
  FileMountstatsSource,
  SSHMountstatsSource,
  type MountstatsSource,
} from '@/lib/sources/mountstats-source';
import { parseOperationsFilter } from '@/lib/utils/operation-filter';
import type { MountSnapshot, MountSnapshotMap } from '@/types/nfs';
import { parseCliArgs, USAGE, type ParsedCli } from './cli';
import { NFSMonitor, selectMounts } from './nfs-monitor';

function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * CLI entry point
 * Loads configuration, takes the baseline snapshot and runs the poll loop
 * until the report count is reached or SIGINT/SIGTERM arrives.
 */
async function main(): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${describeError(err)}\n`);
    console.error(USAGE);
    return 2;
  }

  if (parsed.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  let config: MonitorConfig;
  let sshConfig: SSHSourceConfig | null;
  let influxConfig: InfluxDBConfig | null;
  try {
    config = loadMonitorConfig(parsed.options);
    sshConfig = loadSSHSourceConfig();
    influxConfig = loadInfluxDBConfig();
  } catch (err) {
    console.error(`[Main] Invalid configuration: ${describeError(err)}`);
    return 1;
  }

  const source: MountstatsSource = sshConfig
    ? new SSHMountstatsSource(sshConfig, config.mountstatsPath)
    : new FileMountstatsSource(config.mountstatsPath);

  let exporter: MetricsExporter | undefined;

  try {
    let initial: MountSnapshotMap;
    let baselineAt: number;
    try {
      initial = parseMountstats(await source.readLines());
      baselineAt = performance.now();
    } catch (err) {
      console.error(`Error reading mountstats from ${source.name}: ${describeError(err)}`);
      return 1;
    }

    if (initial.size === 0) {
      console.error(`No NFS mounts found in ${source.name}`);
      return 1;
    }

    let monitored: MountSnapshot[];
    try {
      monitored = selectMounts(config.mountPoint, initial);
    } catch (err) {
      console.error(`Error: ${describeError(err)}`);
      return 1;
    }

    if (influxConfig) {
      const influx = new InfluxClient(influxConfig);
      await influx.connect();
      exporter = createInfluxMetricsExporter(influx, sshConfig?.name ?? hostname());
    }

    const shutdownController = new AbortController();
    const shutdown = () => {
      shutdownController.abort(new DOMException('Shutdown', 'AbortError'));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    renderInitialSummary(
      process.stdout,
      config.mountPoint,
      monitored,
      parseOperationsFilter(config.operations),
    );

    const monitor = new NFSMonitor({
      config,
      source,
      writer: process.stdout,
      exporter,
      abortController: shutdownController,
    });
    await monitor.run(initial, baselineAt);

    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    console.log('Monitoring stopped.');
    return 0;
  } catch (err) {
    console.error('[Main] Fatal error:', err);
    return 1;
  } finally {
    await Promise.all([source.close(), exporter?.close()]);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[Main] Unhandled error:', err);
    process.exitCode = 1;
  },
);
