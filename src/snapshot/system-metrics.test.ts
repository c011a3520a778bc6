import { describe, it, expect } from "vitest";
import { createSystemMetrics } from "./system-metrics.js";

function missing(): never {
  const error = new Error("ENOENT: no such file or directory");
  throw Object.assign(error, { code: "ENOENT" });
}

describe("createSystemMetrics", () => {
  it("reads the CPU temperature in millidegrees from thermal_zone0", () => {
    const metrics = createSystemMetrics({
      readFile: (path) => (path === "/sys/class/thermal/thermal_zone0/temp" ? "48312\n" : missing())
    });

    expect(metrics.cpuTemp()).toBe("48C");
  });

  it("falls back to hwmon when thermal_zone0 is unavailable", () => {
    const metrics = createSystemMetrics({
      readFile: (path) => (path === "/sys/class/hwmon/hwmon0/temp1_input" ? "52.6" : missing())
    });

    expect(metrics.cpuTemp()).toBe("53C");
  });

  it("reports a dash when no sensor can be read", () => {
    const metrics = createSystemMetrics({
      readFile: (path) => (path === "/sys/class/thermal/thermal_zone0/temp" ? "garbage" : missing())
    });

    expect(metrics.cpuTemp()).toBe("-");
  });

  it("parses the GPU temperature from vcgencmd", () => {
    const metrics = createSystemMetrics({ exec: () => "temp=47.2'C\n" });

    expect(metrics.gpuTemp()).toBe("47C");
  });

  it("reports a dash when vcgencmd is missing", () => {
    const metrics = createSystemMetrics({
      exec: () => {
        throw new Error("spawnSync vcgencmd ENOENT");
      }
    });

    expect(metrics.gpuTemp()).toBe("-");
  });

  it("formats the one-minute load average", () => {
    const metrics = createSystemMetrics({ loadavg: () => [1.5, 1, 0.5] });

    expect(metrics.load1()).toBe("1.50");
  });

  it("computes memory usage from total and free memory", () => {
    const metrics = createSystemMetrics({ totalmem: () => 1000, freemem: () => 250 });

    expect(metrics.memoryPercent()).toBe("75%");
  });

  it("computes disk usage the way df does", () => {
    const metrics = createSystemMetrics({ statfs: () => ({ blocks: 1000, bfree: 400, bavail: 350 }) });

    expect(metrics.diskPercent()).toBe("63%");
  });

  it("reports a dash when the filesystem cannot be inspected", () => {
    const metrics = createSystemMetrics({
      statfs: () => {
        throw new Error("EACCES");
      }
    });

    expect(metrics.diskPercent()).toBe("-");
  });
});
