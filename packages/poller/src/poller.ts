import { createRetryState, nextRetryState, type BackoffPolicy } from "./retry-state.js";
import { sleep as defaultSleep } from "./sleep.js";
import type {
  CachedValue,
  Poller,
  PollerLogger,
  PollerOptions,
  RetryState,
} from "./types.js";

const DEFAULT_ERROR_MAX_LENGTH = 60;

const silentLogger: PollerLogger = {
  verbose() {},
  warn() {},
};

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : text.slice(0, maxLength);
}

function validateOptions<T>(options: PollerOptions<T>): void {
  if (!(options.refreshIntervalMs > 0)) {
    throw new RangeError(`Poller "${options.name}": refreshIntervalMs must be > 0.`);
  }
  if (!(options.backoffFloorMs > 0)) {
    throw new RangeError(`Poller "${options.name}": backoffFloorMs must be > 0.`);
  }
  if (options.backoffCeilingMs < options.backoffFloorMs) {
    throw new RangeError(
      `Poller "${options.name}": backoffCeilingMs must be >= backoffFloorMs.`,
    );
  }
}

export function createPoller<T>(options: PollerOptions<T>): Poller<T> {
  validateOptions(options);

  const { name } = options;
  const sleep = options.deps?.sleep ?? defaultSleep;
  const now = options.deps?.now ?? Date.now;
  const logger = options.deps?.logger ?? silentLogger;
  const errorMaxLength = options.errorMaxLength ?? DEFAULT_ERROR_MAX_LENGTH;
  const policy: BackoffPolicy = {
    floorMs: options.backoffFloorMs,
    ceilingMs: options.backoffCeilingMs,
  };

  // Replaced wholesale on every change, so readers always hold a complete value.
  let current: Readonly<CachedValue<T>> = Object.freeze({
    value: options.initialValue,
    ok: false,
    stale: true,
    lastSuccessTime: 0,
    error: "",
  });
  let retry: Readonly<RetryState> = Object.freeze(createRetryState(policy));
  let controller: AbortController | null = null;
  let running: Promise<void> | null = null;

  const publish = (next: CachedValue<T>): void => {
    current = Object.freeze(next);
  };

  const setRetry = (next: RetryState): void => {
    retry = Object.freeze(next);
  };

  async function seedFromCache(): Promise<void> {
    if (!options.preload) return;
    try {
      const seeded = await options.preload();
      if (seeded) {
        publish({
          value: seeded.value,
          ok: true,
          stale: true,
          lastSuccessTime: seeded.savedAt ?? 0,
          error: "(cache)",
        });
        logger.verbose(`${name}: seeded from cache`);
      }
    } catch (error) {
      logger.warn(`${name}: ignoring unreadable cache (${describeError(error)})`);
    }
  }

  async function persistQuietly(value: T): Promise<void> {
    if (!options.persist) return;
    try {
      await options.persist(value);
    } catch (error) {
      logger.warn(`${name}: failed to persist (${describeError(error)})`);
    }
  }

  function notifySuccess(value: T): void {
    if (!options.onSuccess) return;
    try {
      options.onSuccess(value);
    } catch (error) {
      logger.warn(`${name}: success handler failed (${describeError(error)})`);
    }
  }

  async function loop(signal: AbortSignal): Promise<void> {
    await seedFromCache();

    while (!signal.aborted) {
      let value: T;
      try {
        value = await options.fetch(signal);
      } catch (error) {
        if (signal.aborted) break;
        const message = truncate(describeError(error), errorMaxLength);
        publish({ ...current, stale: true, error: message });
        logger.verbose(`${name}: fetch failed (${message}); retrying in ${retry.backoffMs}ms`);
        await sleep(retry.backoffMs, signal);
        setRetry(nextRetryState(retry, policy));
        continue;
      }
      if (signal.aborted) break;

      publish({ value, ok: true, stale: false, lastSuccessTime: now(), error: "" });
      notifySuccess(value);
      await persistQuietly(value);
      setRetry(createRetryState(policy));
      await sleep(options.refreshIntervalMs, signal);
    }
  }

  return {
    name,

    start(signal) {
      if (running) return running;

      const local = new AbortController();
      controller = local;
      if (signal?.aborted) {
        local.abort();
      } else {
        signal?.addEventListener("abort", () => local.abort(), { once: true });
      }

      const loopPromise = loop(local.signal).finally(() => {
        if (running === loopPromise) {
          running = null;
          controller = null;
        }
      });
      running = loopPromise;
      return loopPromise;
    },

    async stop() {
      controller?.abort();
      if (running) {
        await running;
      }
    },

    snapshot() {
      const value = current;
      const staleAfter = options.refreshIntervalMs + retry.backoffMs;
      if (!value.stale && now() - value.lastSuccessTime > staleAfter) {
        return Object.freeze({ ...value, stale: true });
      }
      return value;
    },

    retryState() {
      return retry;
    },
  };
}
