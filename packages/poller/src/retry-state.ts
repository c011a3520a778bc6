import type { RetryState } from "./types.js";

export interface BackoffPolicy {
  floorMs: number;
  ceilingMs: number;
}

export function createRetryState(policy: BackoffPolicy): RetryState {
  return { backoffMs: policy.floorMs, consecutiveFailures: 0 };
}

export function nextRetryState(state: RetryState, policy: BackoffPolicy): RetryState {
  return {
    backoffMs: Math.min(state.backoffMs * 2, policy.ceilingMs),
    consecutiveFailures: state.consecutiveFailures + 1,
  };
}
