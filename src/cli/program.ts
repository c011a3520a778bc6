import { Command } from "commander";
import { createRequire } from "node:module";
import { createCliContainer, type CliDependencies } from "./container.js";
import { registerRunCommand } from "./commands/run.js";
import { registerStatusCommand } from "./commands/status.js";

const require = createRequire(import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Finds the package manifest from both the sources and the compiled tree. */
function readPackageVersion(): string {
  for (const candidate of ["../../package.json", "../../../package.json"]) {
    let manifest: unknown;
    try {
      manifest = require(candidate);
    } catch {
      continue;
    }
    if (isRecord(manifest) && manifest.name === "deskpanel" && typeof manifest.version === "string") {
      return manifest.version;
    }
  }
  return "0.0.0";
}

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = new Command();

  program
    .name("deskpanel")
    .description("Drive an always-on information panel from remote and local data.")
    .option("-c, --config <path>", "Config file (YAML or JSON).")
    .option("--verbose", "Show verbose logs.")
    .version(readPackageVersion(), "-V, --version", "Output the version number.")
    .helpOption("-h, --help", "Display help for command");

  registerRunCommand(program, container);
  registerStatusCommand(program, container);

  if (dependencies.exitOverride ?? true) {
    applyExitOverride(program);
  }

  if (dependencies.suppressCommanderOutput) {
    suppressCommanderOutput(program);
  }

  return program;
}

export type { CliDependencies };

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) {
    applyExitOverride(child);
  }
}

function suppressCommanderOutput(command: Command): void {
  command.configureOutput({
    writeOut: () => {},
    writeErr: () => {}
  });
  for (const child of command.commands) {
    suppressCommanderOutput(child);
  }
}
