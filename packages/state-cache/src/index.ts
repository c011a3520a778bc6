export {
  createDefaultFs,
  createJsonStore,
  readJsonFile,
  resolveStateDir,
  writeJsonFileAtomic,
} from "./disk-cache.js";
export type { JsonStore, JsonStoreOptions } from "./disk-cache.js";
export type {
  DiskCacheFs,
  ParseFn,
  StoreErrorContext,
  StoreErrorHandler,
} from "./types.js";
