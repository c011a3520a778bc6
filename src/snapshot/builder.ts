import type { ReachabilityStatus } from "@deskpanel/poller";
import type { LunarInfo } from "../services/text-client.js";
import type { WeatherReport } from "../sources/weather-source.js";
import type { SystemMetrics } from "./system-metrics.js";
import type { Snapshot, SnapshotSource } from "./types.js";

export interface SnapshotBuilderOptions {
  network: SnapshotSource<ReachabilityStatus>;
  weather: SnapshotSource<WeatherReport>;
  quote: SnapshotSource<string>;
  lunar: SnapshotSource<LunarInfo>;
  metrics: SystemMetrics;
  now?: () => Date;
}

export interface SnapshotBuilder {
  build(): Snapshot;
}

/**
 * Each source is read on its own; the result is consistent per source, not
 * across sources.
 */
export function createSnapshotBuilder(options: SnapshotBuilderOptions): SnapshotBuilder {
  const now = options.now ?? (() => new Date());

  return {
    build() {
      const network = options.network.snapshot();
      const weather = options.weather.snapshot();
      const quote = options.quote.snapshot();
      const lunar = options.lunar.snapshot();
      const { metrics } = options;

      return Object.freeze({
        now: now(),
        ip: network.value.ip,
        online: network.value.reachable,
        cpuTemp: metrics.cpuTemp(),
        gpuTemp: metrics.gpuTemp(),
        load1: metrics.load1(),
        memoryPercent: metrics.memoryPercent(),
        diskPercent: metrics.diskPercent(),
        network,
        weather,
        quote,
        lunar
      });
    }
  };
}
