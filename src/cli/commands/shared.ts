import type { Command } from "commander";
import { loadConfig, type LoadedConfig } from "../../config/loader.js";
import { createPanel, type Panel, type PanelDeps } from "../../panel/panel.js";
import type { CliContainer } from "../container.js";
import type { ScopedLogger } from "../logger.js";

export interface CommandFlags {
  verbose: boolean;
  configPath?: string;
}

export function resolveCommandFlags(program: Command): CommandFlags {
  const opts = program.optsWithGlobals();
  return {
    verbose: Boolean(opts.verbose),
    configPath: typeof opts.config === "string" ? opts.config : undefined
  };
}

export async function loadCommandConfig(
  container: CliContainer,
  flags: CommandFlags,
  logger: ScopedLogger
): Promise<LoadedConfig> {
  const loaded = await loadConfig({
    configPath: flags.configPath,
    cwd: container.env.cwd,
    env: container.env.variables,
    fs: container.dependencies.fs
  });
  logger.verbose(loaded.sourcePath ? `config: ${loaded.sourcePath}` : "config: defaults");
  return loaded;
}

export function createCommandPanel(
  container: CliContainer,
  loaded: LoadedConfig,
  logger: ScopedLogger
): { panel: Panel; deps: PanelDeps } {
  const deps: PanelDeps = {
    homedir: () => container.env.homeDir,
    ...container.dependencies.panel,
    logger: logger.child({ scope: "poller" })
  };
  return { panel: createPanel(loaded.config, deps), deps };
}
