export interface DiskCacheFs {
  readFile(path: string, encoding: BufferEncoding): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(path: string): Promise<void>;
}

/**
 * Narrows a decoded JSON document to the record a store holds.
 * Returning null marks the document as unusable.
 */
export type ParseFn<T> = (raw: unknown) => T | null;

export interface StoreErrorContext {
  operation: "load" | "save";
  path: string;
}

export type StoreErrorHandler = (error: Error, context: StoreErrorContext) => void;
