import type { MonitorConfig } from '@/lib/config/monitor-config';
import {
  CLEAR_SCREEN,
  renderNfsiostatStats,
  renderSimpleStats,
  type TextWriter,
} from '@/lib/display/stats-table';
import type { MetricsExporter } from '@/lib/exporters/influx-metrics-exporter';
import { MountNotFoundError } from '@/lib/parsers/parse-errors';
import { parseMountstats } from '@/lib/parsers/mountstats-parser';
import type { MountstatsSource } from '@/lib/sources/mountstats-source';
import { calculateDeltaStats } from '@/lib/utils/nfs-delta-calculator';
import { filterOperations, parseOperationsFilter } from '@/lib/utils/operation-filter';
import { waitForNextPoll } from '@/lib/utils/poll-wait';
import type { MountSnapshot, MountSnapshotMap } from '@/types/nfs';

/**
 * Pick the mounts to monitor: the one named, or all of them sorted by path.
 *
 * @throws {MountNotFoundError} If `mountPoint` is not in the report
 */
export function selectMounts(
  mountPoint: string | undefined,
  mounts: MountSnapshotMap,
): MountSnapshot[] {
  if (mountPoint !== undefined) {
    const mount = mounts.get(mountPoint);
    if (!mount) throw new MountNotFoundError(mountPoint);
    return [mount];
  }
  return [...mounts.values()].sort((a, b) => a.mountPoint.localeCompare(b.mountPoint));
}

export interface NFSMonitorOptions {
  config: MonitorConfig;
  source: MountstatsSource;
  writer: TextWriter;
  exporter?: MetricsExporter;
  abortController?: AbortController;
  /** Monotonic clock in milliseconds (default: performance.now); baselines passed to `run` use it too */
  now?: () => number;
  /** Wall clock for report timestamps */
  clock?: () => Date;
}

/**
 * The poll loop: read, parse, diff against the previous snapshot, render.
 *
 * The previous snapshot map is a local of `run()` and is replaced by each
 * successful read; nothing else holds or mutates it.
 */
export class NFSMonitor {
  readonly name = 'Monitor';

  private readonly config: MonitorConfig;
  private readonly source: MountstatsSource;
  private readonly writer: TextWriter;
  private readonly exporter?: MetricsExporter;
  private readonly abortController: AbortController;
  private readonly signal: AbortSignal;
  private readonly now: () => number;
  private readonly clock: () => Date;
  private readonly operationsFilter: Set<string>;

  constructor(options: NFSMonitorOptions) {
    this.config = options.config;
    this.source = options.source;
    this.writer = options.writer;
    this.exporter = options.exporter;
    this.abortController = options.abortController ?? new AbortController();
    this.signal = this.abortController.signal;
    this.now = options.now ?? (() => performance.now());
    this.clock = options.clock ?? (() => new Date());
    this.operationsFilter = parseOperationsFilter(options.config.operations);
  }

  /**
   * Run until `count` reports were produced or the monitor is stopped.
   *
   * @param initial - Baseline snapshot
   * @param baselineAt - Reading of `now` taken when `initial` was read
   *   (default: the time of the call)
   * @returns Number of completed poll cycles
   */
  async run(initial: MountSnapshotMap, baselineAt?: number): Promise<number> {
    const intervalMs = this.config.interval * 1000;
    let previous = initial;
    let lastUpdate = baselineAt ?? this.now();
    let iteration = 0;

    this.debugLog(`[${this.name}] Polling ${this.source.name} every ${intervalMs}ms`);

    while (!this.signal.aborted) {
      if (this.config.count > 0 && iteration >= this.config.count) break;

      if (await waitForNextPoll(intervalMs, this.signal) === 'stopped') break;

      let current: MountSnapshotMap;
      try {
        current = parseMountstats(await this.source.readLines());
      } catch (err) {
        // A mount can vanish mid-read; keep the old baseline and try again
        const errMsg = err instanceof Error ? err.message : String(err);
        console.error(`[${this.name}] Error reading mountstats: ${errMsg}`);
        continue;
      }

      const t = this.now();
      const elapsedSeconds = (t - lastUpdate) / 1000;
      lastUpdate = t;

      await this.report(previous, current, elapsedSeconds);
      previous = current;
      iteration++;
    }

    this.debugLog(`[${this.name}] Stopped after ${iteration} cycles`);
    return iteration;
  }

  /** Signal the loop to stop. */
  stop(): void {
    if (!this.signal.aborted) {
      this.abortController.abort(new DOMException('Monitor stopped', 'AbortError'));
    }
  }

  private async report(
    previous: MountSnapshotMap,
    current: MountSnapshotMap,
    elapsedSeconds: number,
  ): Promise<void> {
    if (this.config.clearScreen) {
      this.writer.write(CLEAR_SCREEN);
    }

    const timestamp = this.clock();
    const mounts = this.config.mountPoint !== undefined
      ? [current.get(this.config.mountPoint)].filter((m): m is MountSnapshot => m !== undefined)
      : selectMounts(undefined, current);

    for (const mount of mounts) {
      const previousMount = previous.get(mount.mountPoint);
      if (!previousMount) {
        this.debugLog(`[${this.name}] New mount ${mount.mountPoint}, waiting for a second sample`);
        continue;
      }

      const records = filterOperations(
        calculateDeltaStats(previousMount, mount, elapsedSeconds),
        this.operationsFilter,
      );

      if (this.config.nfsiostat) {
        renderNfsiostatStats(this.writer, mount, records, previousMount, this.config.showAttr);
      } else {
        renderSimpleStats(this.writer, mount, records, this.config.showBandwidth, timestamp);
      }

      if (this.exporter) {
        try {
          await this.exporter.exportMount(mount, records, timestamp);
        } catch (err) {
          console.error(`[${this.name}] Metrics export failed for ${mount.mountPoint}:`, err);
        }
      }
    }
  }

  /** Log a message only when debug logging is enabled */
  private debugLog(message: string): void {
    if (this.config.debugLogging) {
      console.log(message);
    }
  }
}
