import { dirname, join } from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import type { DiskCacheFs, ParseFn, StoreErrorHandler } from "./types.js";

interface DiskCacheDeps {
  fs: DiskCacheFs;
}

interface ResolveStateDirDeps {
  homedir?: () => string;
}

export function createDefaultFs(): DiskCacheFs {
  return {
    readFile: (path, encoding) => fs.readFile(path, encoding),
    writeFile: (path, data) => fs.writeFile(path, data, "utf8"),
    mkdir: (path, options) => fs.mkdir(path, options).then(() => {}),
    rename: (from, to) => fs.rename(from, to),
    unlink: (path) => fs.unlink(path),
  };
}

/**
 * Check if an error is a "file not found" (ENOENT) error.
 */
function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Any failure yields null. Everything except a missing file is also passed
 * to `onError` as a `load` failure.
 */
export async function readJsonFile<T>(
  path: string,
  deps: DiskCacheDeps & { parse: ParseFn<T>; onError?: StoreErrorHandler },
): Promise<T | null> {
  const report = (error: unknown): null => {
    deps.onError?.(toError(error), { operation: "load", path });
    return null;
  };

  let content: string;
  try {
    content = await deps.fs.readFile(path, "utf8");
  } catch (error) {
    return isNotFound(error) ? null : report(error);
  }

  let parsed: T | null;
  try {
    parsed = deps.parse(JSON.parse(content));
  } catch (error) {
    return report(error);
  }
  if (parsed === null) {
    return report(new Error("unrecognised cache record"));
  }
  return parsed;
}

export async function writeJsonFileAtomic(
  path: string,
  data: unknown,
  deps: DiskCacheDeps,
): Promise<void> {
  const tmpPath = `${path}.tmp`;
  await deps.fs.mkdir(dirname(path), { recursive: true });
  try {
    await deps.fs.writeFile(tmpPath, JSON.stringify(data, null, 2));
    await deps.fs.rename(tmpPath, path);
  } catch (error) {
    await deps.fs.unlink(tmpPath).catch(() => {});
    throw error;
  }
}

export interface JsonStoreOptions<T> {
  dir: string;
  fileName: string;
  fs?: DiskCacheFs;
  parse: ParseFn<T>;
  onError?: StoreErrorHandler;
}

export interface JsonStore<T> {
  readonly path: string;
  load(): Promise<T | null>;
  save(data: T): Promise<void>;
}

export function createJsonStore<T>(options: JsonStoreOptions<T>): JsonStore<T> {
  const diskFs = options.fs ?? createDefaultFs();
  const path = join(options.dir, options.fileName);

  return {
    path,

    load() {
      return readJsonFile<T>(path, {
        fs: diskFs,
        parse: options.parse,
        onError: options.onError,
      });
    },

    async save(data) {
      try {
        await writeJsonFileAtomic(path, data, { fs: diskFs });
      } catch (error) {
        options.onError?.(toError(error), { operation: "save", path });
      }
    },
  };
}

export function resolveStateDir(
  dir: string,
  deps?: ResolveStateDirDeps,
): string {
  if (dir === "~" || dir.startsWith("~/")) {
    const home = deps?.homedir ? deps.homedir() : os.homedir();
    return join(home, dir.slice(1));
  }
  return dir;
}
