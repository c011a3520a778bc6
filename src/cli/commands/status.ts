import type { Command } from "commander";
import type { Poller } from "@deskpanel/poller";
import { waitForFirstRound } from "../../panel/first-round.js";
import type { CliContainer } from "../container.js";
import { CliError } from "../errors.js";
import { createCommandPanel, loadCommandConfig, resolveCommandFlags } from "./shared.js";

interface StatusOptions {
  timeout: string;
}

export function describePoller(poller: Pick<Poller<unknown>, "name" | "snapshot">): string {
  const value = poller.snapshot();
  const state = !value.ok ? "failed" : value.stale ? "stale" : "ok";
  const detail = value.error ? ` (${value.error})` : "";
  return `${poller.name.padEnd(8)}${state}${detail}`;
}

export function registerStatusCommand(program: Command, container: CliContainer): void {
  program
    .command("status")
    .description("Poll every source once and print a single snapshot.")
    .option("--timeout <seconds>", "How long to wait for every source", "10")
    .action(async (options: StatusOptions) => {
      await executeStatus(program, container, options);
    });
}

async function executeStatus(program: Command, container: CliContainer, options: StatusOptions): Promise<void> {
  const timeoutSeconds = Number(options.timeout);
  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new CliError(`Invalid --timeout "${options.timeout}": expected a positive number of seconds.`);
  }

  const flags = resolveCommandFlags(program);
  const logger = container.loggerFactory.create({ verbose: flags.verbose, scope: "status" });
  const loaded = await loadCommandConfig(container, flags, logger);
  const { panel, deps } = createCommandPanel(container, loaded, logger);

  logger.intro("deskpanel status");

  const controller = new AbortController();
  const release = container.onShutdown(() => controller.abort());
  const running = panel.start(controller.signal);

  try {
    const settled = await waitForFirstRound(panel.pollers, {
      timeoutMs: timeoutSeconds * 1000,
      signal: controller.signal,
      now: deps.now,
      sleep: deps.sleep
    });
    if (!settled) {
      logger.warn(`Some sources did not answer within ${timeoutSeconds}s.`);
    }

    const snapshot = panel.builder.build();
    for (const poller of panel.pollers) {
      logger.info(describePoller(poller));
    }
    logger.info(`ip ${snapshot.ip}  cpu ${snapshot.cpuTemp}  gpu ${snapshot.gpuTemp}  load ${snapshot.load1}`);
    logger.info(`mem ${snapshot.memoryPercent}  disk ${snapshot.diskPercent}`);
    if (snapshot.weather.ok) {
      const { locationName, current } = snapshot.weather.value;
      logger.info(`weather ${locationName} ${current.tempC}°C ${current.text}`);
    }
    const ticker = panel.queue.current();
    if (ticker) {
      logger.info(`ticker ${ticker}`);
    }
  } finally {
    controller.abort();
    release();
    await running;
  }
}
