import { describe, it, expect } from "vitest";
import { createMemFs } from "@deskpanel/state-cache/testing";
import { createProgram } from "../program.js";
import { CLEAR_SCREEN } from "../../panel/terminal-sink.js";
import type { SystemMetrics } from "../../snapshot/system-metrics.js";

const metrics: SystemMetrics = {
  cpuTemp: () => "48C",
  gpuTemp: () => "-",
  load1: () => "0.10",
  memoryPercent: () => "20%",
  diskPercent: () => "40%"
};

function setup(config: string) {
  const fs = createMemFs({ "/repo/deskpanel.yaml": config });
  const chunks: string[] = [];
  let shutdown: (() => void) | undefined;
  const program = createProgram({
    env: { cwd: "/repo", homeDir: "/home/test", variables: {} },
    fs,
    logger: () => {},
    stdout: (chunk) => {
      chunks.push(chunk);
      shutdown?.();
    },
    onShutdown: (handler) => {
      shutdown = handler;
      return () => {
        shutdown = undefined;
      };
    },
    panel: { fs, probe: async () => true, resolveIp: () => "10.0.0.7", metrics },
    suppressCommanderOutput: true
  });
  return { program, chunks };
}

describe("run command", () => {
  it("draws frames until a shutdown signal arrives", async () => {
    const { program, chunks } = setup("display:\n  columns: 30\nticker:\n  fallbackText: hello desk\n");

    await program.parseAsync(["node", "deskpanel", "run", "--page", "status"]);

    expect(chunks).toHaveLength(1);
    const [chunk] = chunks;
    expect(chunk.startsWith(CLEAR_SCREEN)).toBe(true);
    const lines = chunk.slice(CLEAR_SCREEN.length).split("\n");
    expect(lines[0]).toMatch(/^\d\d:\d\d {2}- {2}-$/);
    expect(lines.slice(1)).toEqual([
      "-".repeat(30),
      "CPU 48C  GPU -",
      "Load 0.10",
      "Mem 20%  Disk 40%",
      "IP -",
      "-".repeat(30),
      "» hello desk",
      ""
    ]);
  });

  it("is the default command", async () => {
    const { program, chunks } = setup("display:\n  pages: [quotes]\n");

    await program.parseAsync(["node", "deskpanel"]);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toContain("\n-\n");
  });

  it("rejects unknown pages", async () => {
    const { program } = setup("");

    await expect(program.parseAsync(["node", "deskpanel", "run", "--page", "video"])).rejects.toMatchObject({
      code: "commander.invalidArgument"
    });
  });
});
