export interface CachedValue<T> {
  value: T;
  ok: boolean;
  stale: boolean;
  /** Epoch milliseconds of the last successful fetch; 0 when none is known. */
  lastSuccessTime: number;
  error: string;
}

export interface RetryState {
  backoffMs: number;
  consecutiveFailures: number;
}

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PollerLogger {
  verbose(message: string): void;
  warn(message: string): void;
}

export interface Preloaded<T> {
  value: T;
  savedAt?: number;
}

export interface PollerDeps {
  sleep: SleepFn;
  now: () => number;
  logger: PollerLogger;
}

export interface PollerOptions<T> {
  name: string;
  fetch: (signal: AbortSignal) => Promise<T>;
  initialValue: T;
  refreshIntervalMs: number;
  backoffFloorMs: number;
  backoffCeilingMs: number;
  persist?: (value: T) => Promise<void>;
  preload?: () => Promise<Preloaded<T> | null>;
  onSuccess?: (value: T) => void;
  errorMaxLength?: number;
  deps?: Partial<PollerDeps>;
}

export interface Poller<T> {
  readonly name: string;
  start(signal?: AbortSignal): Promise<void>;
  stop(): Promise<void>;
  snapshot(): Readonly<CachedValue<T>>;
  retryState(): Readonly<RetryState>;
}
