import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { pathToFileURL } from "node:url";
import { log } from "@clack/prompts";
import type { Command } from "commander";
import { CliError, SilentError } from "./errors.js";
import type { CliDependencies } from "./program.js";

export function createCliMain(
  programFactory: (dependencies: CliDependencies) => Command
): () => Promise<void> {
  return async function runCli(): Promise<void> {
    const program = programFactory({
      env: {
        cwd: process.cwd(),
        homeDir: homedir(),
        variables: process.env
      },
      exitOverride: false
    });

    try {
      await program.parseAsync(process.argv);
    } catch (error) {
      if (error instanceof SilentError) {
        return;
      }
      if (error instanceof Error) {
        if (error instanceof CliError && error.isUserError) {
          log.error(error.message);
        } else {
          log.error(`Error: ${error.message}`);
        }
        process.exit(1);
      }
      throw error;
    }
  };
}

export function isCliInvocation(
  argv: string[],
  moduleUrl: string,
  realpath: (path: string) => string = realpathSync
): boolean {
  const entry = argv.at(1);
  if (typeof entry !== "string") {
    return false;
  }

  const candidates = [pathToFileURL(entry).href];

  try {
    candidates.push(pathToFileURL(realpath(entry)).href);
  } catch {
    // Ignore resolution errors; fall back to direct comparison.
  }

  return candidates.includes(moduleUrl);
}
