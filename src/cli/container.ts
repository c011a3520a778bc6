import type { ConfigFileSystem } from "../config/loader.js";
import type { PanelDeps } from "../panel/panel.js";
import { createLoggerFactory, type LoggerFactory, type LoggerFn } from "./logger.js";

export interface CliEnvironment {
  cwd: string;
  homeDir: string;
  variables: Record<string, string | undefined>;
}

/** Registers a shutdown handler; the returned function unregisters it. */
export type ShutdownHook = (handler: () => void) => () => void;

export interface CliDependencies {
  env: CliEnvironment;
  fs?: ConfigFileSystem;
  logger?: LoggerFn;
  stdout?: (chunk: string) => void;
  panel?: Partial<Omit<PanelDeps, "logger">>;
  onShutdown?: ShutdownHook;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface CliContainer {
  env: CliEnvironment;
  dependencies: CliDependencies;
  loggerFactory: LoggerFactory;
  stdout: (chunk: string) => void;
  onShutdown: ShutdownHook;
}

const processShutdown: ShutdownHook = (handler) => {
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
  return () => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
  };
};

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  return {
    env: dependencies.env,
    dependencies,
    loggerFactory: createLoggerFactory(dependencies.logger),
    stdout:
      dependencies.stdout ??
      ((chunk) => {
        process.stdout.write(chunk);
      }),
    onShutdown: dependencies.onShutdown ?? processShutdown
  };
}
