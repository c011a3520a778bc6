import fs from "node:fs";
import os from "node:os";
import { execFileSync } from "node:child_process";

export const CPU_TEMP_PATHS = [
  "/sys/class/thermal/thermal_zone0/temp",
  "/sys/class/hwmon/hwmon0/temp1_input"
] as const;

const UNKNOWN = "-";

export interface DiskUsage {
  blocks: number;
  bfree: number;
  bavail: number;
}

export interface SystemMetricsDeps {
  readFile(path: string): string;
  loadavg(): number[];
  totalmem(): number;
  freemem(): number;
  statfs(path: string): DiskUsage;
  exec(command: string, args: string[]): string;
}

export interface SystemMetrics {
  cpuTemp(): string;
  gpuTemp(): string;
  load1(): string;
  memoryPercent(): string;
  diskPercent(): string;
}

const defaultDeps: SystemMetricsDeps = {
  readFile: (path) => fs.readFileSync(path, "utf8"),
  loadavg: () => os.loadavg(),
  totalmem: () => os.totalmem(),
  freemem: () => os.freemem(),
  statfs: (path) => fs.statfsSync(path),
  exec: (command, args) =>
    execFileSync(command, args, {
      encoding: "utf8",
      timeout: 500,
      stdio: ["ignore", "pipe", "ignore"]
    })
};

function readOr(read: () => string): string {
  try {
    return read();
  } catch {
    return UNKNOWN;
  }
}

function formatPercent(ratio: number): string {
  if (!Number.isFinite(ratio)) return UNKNOWN;
  return `${Math.round(ratio * 100)}%`;
}

export function createSystemMetrics(
  deps: Partial<SystemMetricsDeps> = {},
  options: { diskPath?: string } = {}
): SystemMetrics {
  const d: SystemMetricsDeps = { ...defaultDeps, ...deps };
  const diskPath = options.diskPath ?? "/";

  return {
    cpuTemp() {
      for (const path of CPU_TEMP_PATHS) {
        let raw: string;
        try {
          raw = d.readFile(path).trim();
        } catch {
          continue;
        }
        let value = Number.parseFloat(raw);
        if (!Number.isFinite(value)) continue;
        // sysfs reports millidegrees
        if (value > 1000) value /= 1000;
        return `${value.toFixed(0)}C`;
      }
      return UNKNOWN;
    },

    gpuTemp() {
      return readOr(() => {
        const match = /temp=([\d.]+)/.exec(d.exec("vcgencmd", ["measure_temp"]));
        return match ? `${Number.parseFloat(match[1]).toFixed(0)}C` : UNKNOWN;
      });
    },

    load1() {
      return readOr(() => {
        const [one] = d.loadavg();
        return one === undefined ? UNKNOWN : one.toFixed(2);
      });
    },

    memoryPercent() {
      return readOr(() => {
        const total = d.totalmem();
        if (total <= 0) return UNKNOWN;
        return formatPercent((total - d.freemem()) / total);
      });
    },

    diskPercent() {
      return readOr(() => {
        const usage = d.statfs(diskPath);
        const used = usage.blocks - usage.bfree;
        const capacity = used + usage.bavail;
        if (capacity <= 0) return UNKNOWN;
        return formatPercent(used / capacity);
      });
    }
  };
}
