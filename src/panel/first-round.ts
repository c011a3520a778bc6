import { sleep as defaultSleep, type Poller, type SleepFn } from "@deskpanel/poller";

export interface FirstRoundOptions {
  timeoutMs: number;
  pollMs?: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: SleepFn;
}

type RoundSource = Pick<Poller<unknown>, "snapshot">;

/**
 * Waits until every poller has either succeeded or failed at least once
 * since the call. Returns false when the timeout or the signal wins.
 */
export async function waitForFirstRound(
  pollers: readonly RoundSource[],
  options: FirstRoundOptions
): Promise<boolean> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const pollMs = options.pollMs ?? 50;
  const signal = options.signal ?? new AbortController().signal;
  const startedAt = now();

  const settled = (poller: RoundSource): boolean => {
    const value = poller.snapshot();
    return value.lastSuccessTime >= startedAt || (value.error !== "" && value.error !== "(cache)");
  };

  while (!pollers.every(settled)) {
    if (signal.aborted || now() - startedAt >= options.timeoutMs) {
      return false;
    }
    await sleep(pollMs, signal);
  }
  return true;
}
