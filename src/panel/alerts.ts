import type { MessageQueue } from "@deskpanel/ticker-queue";
import type { Snapshot } from "../snapshot/types.js";

export const OFFLINE_ALERT = "⚠ network offline";
export const STALE_WEATHER_ALERT = "⚠ weather data stale";
export const ALERT_PRIORITY = 1;

/**
 * Offline is only reported once the reachability poller has answered at
 * least once, so a panel that just booted does not flash an alert.
 */
export function deriveAlert(snapshot: Pick<Snapshot, "network" | "weather">): string | null {
  if (snapshot.network.ok && !snapshot.network.value.reachable) {
    return OFFLINE_ALERT;
  }
  if (snapshot.weather.ok && snapshot.weather.stale) {
    return STALE_WEATHER_ALERT;
  }
  return null;
}

export interface AlertMonitorOptions {
  ttlMs: number;
  priority?: number;
}

export interface AlertMonitor {
  /** Returns the alert now in effect. */
  update(snapshot: Pick<Snapshot, "network" | "weather">): string | null;
}

export function createAlertMonitor(queue: MessageQueue, options: AlertMonitorOptions): AlertMonitor {
  const priority = options.priority ?? ALERT_PRIORITY;
  let active: { id: number; text: string } | null = null;

  const isQueued = (id: number): boolean => queue.items().some((item) => item.id === id);

  return {
    update(snapshot) {
      const alert = deriveAlert(snapshot);

      if (active && (active.text !== alert || !isQueued(active.id))) {
        queue.remove(active.id);
        active = null;
      }
      if (alert && !active) {
        const item = queue.push(alert, options.ttlMs, priority);
        active = { id: item.id, text: alert };
      }
      return alert;
    }
  };
}
