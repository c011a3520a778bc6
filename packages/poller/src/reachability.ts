import net from "node:net";
import os from "node:os";
import { createPoller } from "./poller.js";
import type { Poller, PollerDeps } from "./types.js";

export interface ReachabilityStatus {
  reachable: boolean;
  ip: string;
}

export type ProbeFn = (
  host: string,
  port: number,
  timeoutMs: number,
  signal?: AbortSignal,
) => Promise<boolean>;

export interface ReachabilityPollerOptions {
  host: string;
  port: number;
  timeoutMs: number;
  refreshIntervalMs: number;
  deps?: Partial<
    PollerDeps & {
      probe: ProbeFn;
      resolveIp: () => string;
    }
  >;
}

type InterfaceMap = ReturnType<typeof os.networkInterfaces>;

export function primaryIpv4(
  interfaces: InterfaceMap = os.networkInterfaces(),
): string {
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (address.family === "IPv4" && !address.internal) {
        return address.address;
      }
    }
  }
  return "-";
}

export const probeTcp: ProbeFn = (host, port, timeoutMs, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const socket = net.createConnection({ host, port });
    let settled = false;

    const finish = (reachable: boolean): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      socket.destroy();
      resolve(reachable);
    };
    const onAbort = (): void => finish(false);

    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * The probe never rejects, so every round takes the success path and the
 * poller keeps its fixed cadence.
 */
export function createReachabilityPoller(
  options: ReachabilityPollerOptions,
): Poller<ReachabilityStatus> {
  const probe = options.deps?.probe ?? probeTcp;
  const resolveIp = options.deps?.resolveIp ?? (() => primaryIpv4());

  return createPoller<ReachabilityStatus>({
    name: "network",
    initialValue: { reachable: false, ip: "-" },
    refreshIntervalMs: options.refreshIntervalMs,
    backoffFloorMs: options.refreshIntervalMs,
    backoffCeilingMs: options.refreshIntervalMs,
    fetch: async (signal) => {
      const reachable = await probe(options.host, options.port, options.timeoutMs, signal);
      return { reachable, ip: resolveIp() };
    },
    deps: options.deps,
  });
}
