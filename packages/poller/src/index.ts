export { createPoller } from "./poller.js";
export { createRetryState, nextRetryState } from "./retry-state.js";
export type { BackoffPolicy } from "./retry-state.js";
export { sleep } from "./sleep.js";
export {
  createReachabilityPoller,
  primaryIpv4,
  probeTcp,
} from "./reachability.js";
export type {
  ProbeFn,
  ReachabilityPollerOptions,
  ReachabilityStatus,
} from "./reachability.js";
export type {
  CachedValue,
  Poller,
  PollerDeps,
  PollerLogger,
  PollerOptions,
  Preloaded,
  RetryState,
  SleepFn,
} from "./types.js";
