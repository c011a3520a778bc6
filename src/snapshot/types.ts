import type { CachedValue, Poller, ReachabilityStatus } from "@deskpanel/poller";
import type { LunarInfo } from "../services/text-client.js";
import type { WeatherReport } from "../sources/weather-source.js";

export type SnapshotSource<T> = Pick<Poller<T>, "snapshot">;

export interface Snapshot {
  readonly now: Date;
  readonly ip: string;
  readonly online: boolean;
  readonly cpuTemp: string;
  readonly gpuTemp: string;
  readonly load1: string;
  readonly memoryPercent: string;
  readonly diskPercent: string;
  readonly network: Readonly<CachedValue<ReachabilityStatus>>;
  readonly weather: Readonly<CachedValue<WeatherReport>>;
  readonly quote: Readonly<CachedValue<string>>;
  readonly lunar: Readonly<CachedValue<LunarInfo>>;
}
