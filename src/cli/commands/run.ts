import { Option, type Command } from "commander";
import { PAGE_NAMES, type PageName } from "../../config/schema.js";
import { createAlertMonitor } from "../../panel/alerts.js";
import { createReminderSchedule } from "../../panel/reminders.js";
import { runRenderLoop } from "../../panel/render-loop.js";
import { createTerminalSink } from "../../panel/terminal-sink.js";
import { createTextRenderer } from "../../panel/text-renderer.js";
import type { CliContainer } from "../container.js";
import { createCommandPanel, loadCommandConfig, resolveCommandFlags } from "./shared.js";

interface RunOptions {
  page?: string[];
}

function isPageName(value: string): value is PageName {
  return PAGE_NAMES.some((page) => page === value);
}

export function registerRunCommand(program: Command, container: CliContainer): void {
  program
    .command("run", { isDefault: true })
    .description("Run the panel in this terminal until interrupted.")
    .addOption(new Option("--page <name...>", "Pages to cycle through").choices(PAGE_NAMES))
    .action(async (options: RunOptions) => {
      await executeRun(program, container, options);
    });
}

async function executeRun(program: Command, container: CliContainer, options: RunOptions): Promise<void> {
  const flags = resolveCommandFlags(program);
  const logger = container.loggerFactory.create({ verbose: flags.verbose, scope: "run" });
  const loaded = await loadCommandConfig(container, flags, logger);
  const { config } = loaded;
  const { panel, deps } = createCommandPanel(container, loaded, logger);
  const pages = options.page?.filter(isPageName) ?? config.display.pages;
  const clock = deps.now;

  const controller = new AbortController();
  const release = container.onShutdown(() => controller.abort());

  try {
    await Promise.all([
      panel.start(controller.signal),
      runRenderLoop({
        builder: panel.builder,
        queue: panel.queue,
        render: createTextRenderer({ columns: config.display.columns }),
        sink: createTerminalSink(container.stdout),
        pages,
        pageCycleMs: config.display.pageCycleSeconds * 1000,
        tickMs: config.display.tickSeconds * 1000,
        fallbackText: config.ticker.fallbackText,
        alerts: createAlertMonitor(panel.queue, { ttlMs: config.ticker.alertTtlSeconds * 1000 }),
        reminders: createReminderSchedule(config.reminders, panel.queue, {
          now: clock ? () => new Date(clock()) : undefined
        }),
        signal: controller.signal,
        deps: { sleep: deps.sleep, now: clock, logger }
      }).finally(() => controller.abort())
    ]);
  } finally {
    release();
  }
}
