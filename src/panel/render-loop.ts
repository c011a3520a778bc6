import { sleep as defaultSleep, type SleepFn } from "@deskpanel/poller";
import type { MessageQueue } from "@deskpanel/ticker-queue";
import type { PageName } from "../config/schema.js";
import type { SnapshotBuilder } from "../snapshot/builder.js";
import type { AlertMonitor } from "./alerts.js";
import type { ReminderSchedule } from "./reminders.js";
import type { FrameSink, Renderer } from "./types.js";

export interface RenderLoopDeps {
  sleep: SleepFn;
  now: () => number;
  logger: { warn(message: string): void };
}

export interface RenderLoopOptions<F> {
  builder: SnapshotBuilder;
  queue: MessageQueue;
  render: Renderer<F>;
  sink: FrameSink<F>;
  pages: readonly PageName[];
  pageCycleMs: number;
  tickMs: number;
  fallbackText: string;
  alerts?: AlertMonitor;
  reminders?: ReminderSchedule;
  signal: AbortSignal;
  deps?: Partial<RenderLoopDeps>;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Runs until the signal aborts. Only reads what the pollers have already
 * published; nothing here waits on the network.
 */
export async function runRenderLoop<F>(options: RenderLoopOptions<F>): Promise<void> {
  const { builder, queue, render, sink, pages, signal } = options;
  const sleep = options.deps?.sleep ?? defaultSleep;
  const now = options.deps?.now ?? Date.now;
  const logger = options.deps?.logger ?? { warn: () => {} };

  if (pages.length === 0) {
    throw new RangeError("Render loop needs at least one page.");
  }
  if (options.tickMs <= 0 || options.pageCycleMs <= 0) {
    throw new RangeError("Render loop intervals must be positive.");
  }

  let pageIndex = 0;
  let pageStartedAt = now();
  let lastFailure = "";

  while (!signal.aborted) {
    const snapshot = builder.build();
    options.reminders?.check();
    options.alerts?.update(snapshot);
    const ticker = queue.current() || options.fallbackText;

    const at = now();
    if (at - pageStartedAt >= options.pageCycleMs) {
      pageStartedAt = at;
      pageIndex = (pageIndex + 1) % pages.length;
    }

    try {
      const frame = render(snapshot, { page: pages[pageIndex], ticker });
      await sink.show(frame);
      lastFailure = "";
    } catch (error) {
      const message = describeError(error);
      // one warning per distinct failure, not one per tick
      if (message !== lastFailure) {
        logger.warn(`render: ${message}`);
        lastFailure = message;
      }
    }

    await sleep(options.tickMs, signal);
  }
}
