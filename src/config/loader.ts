import path from "node:path";
import * as fsPromises from "node:fs/promises";
import YAML from "yaml";
import { CliError } from "../cli/errors.js";
import { configSchema, type DeskpanelConfig } from "./schema.js";

export const CONFIG_ENV_VAR = "DESKPANEL_CONFIG";
export const DEFAULT_CONFIG_FILE = "deskpanel.yaml";

export type ConfigFileSystem = {
  readFile(path: string, encoding: BufferEncoding): Promise<string>;
};

export interface LoadConfigOptions {
  /** Value of `--config`. */
  configPath?: string;
  cwd: string;
  env: Record<string, string | undefined>;
  fs?: ConfigFileSystem;
}

export interface LoadedConfig {
  config: DeskpanelConfig;
  /** null when no file was found and the defaults apply. */
  sourcePath: string | null;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function resolveSource(options: LoadConfigOptions): { path: string; required: boolean } {
  if (options.configPath) {
    return { path: path.resolve(options.cwd, options.configPath), required: true };
  }
  const fromEnv = options.env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return { path: path.resolve(options.cwd, fromEnv), required: true };
  }
  return { path: path.join(options.cwd, DEFAULT_CONFIG_FILE), required: false };
}

export function parseConfig(raw: string, sourcePath: string): DeskpanelConfig {
  const format = path.extname(sourcePath).toLowerCase() === ".json" ? "json" : "yaml";

  let parsed: unknown;
  try {
    parsed = format === "yaml" ? YAML.parse(raw) : JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CliError(`Invalid config ${format.toUpperCase()} at ${sourcePath}: ${detail}`);
  }

  if (parsed == null) {
    parsed = {};
  }
  if (!isPlainObject(parsed)) {
    throw new CliError(`Invalid config at ${sourcePath}: expected an object.`);
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new CliError(`Invalid config at ${sourcePath}: "${key}" ${issue?.message ?? "is invalid"}.`);
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const fs: ConfigFileSystem = options.fs ?? fsPromises;
  const source = resolveSource(options);

  let raw: string;
  try {
    raw = await fs.readFile(source.path, "utf8");
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
    if (source.required) {
      throw new CliError(`Config file not found: ${source.path}`);
    }
    return { config: configSchema.parse({}), sourcePath: null };
  }

  return { config: parseConfig(raw, source.path), sourcePath: source.path };
}
