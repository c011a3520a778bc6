import { describe, it, expect } from "vitest";
import { createMessageQueue } from "@deskpanel/ticker-queue";
import type { ReachabilityStatus } from "@deskpanel/poller";
import { cached, createSnapshot, sampleWeather } from "../../tests/helpers/snapshot.js";
import { createAlertMonitor, deriveAlert, OFFLINE_ALERT, STALE_WEATHER_ALERT } from "./alerts.js";

const offline = cached<ReachabilityStatus>({ reachable: false, ip: "-" });
const staleWeather = cached(sampleWeather, { stale: true, error: "HTTP 500: Internal Server Error" });

describe("deriveAlert", () => {
  it("reports the network offline once reachability has been probed", () => {
    expect(deriveAlert(createSnapshot({ network: offline }))).toBe(OFFLINE_ALERT);
  });

  it("stays quiet before the first reachability probe", () => {
    const unprobed = cached<ReachabilityStatus>({ reachable: false, ip: "-" }, { ok: false, stale: true });

    expect(deriveAlert(createSnapshot({ network: unprobed }))).toBeNull();
  });

  it("reports stale weather only when some weather is known", () => {
    const neverFetched = cached(sampleWeather, { ok: false, stale: true });

    expect(deriveAlert(createSnapshot({ weather: staleWeather }))).toBe(STALE_WEATHER_ALERT);
    expect(deriveAlert(createSnapshot({ weather: neverFetched }))).toBeNull();
  });

  it("prefers the offline alert over stale weather", () => {
    expect(deriveAlert(createSnapshot({ network: offline, weather: staleWeather }))).toBe(OFFLINE_ALERT);
  });

  it("returns null when everything is fresh", () => {
    expect(deriveAlert(createSnapshot())).toBeNull();
  });
});

describe("createAlertMonitor", () => {
  it("pushes an alert once while it is still on the ticker", () => {
    const queue = createMessageQueue({ now: () => 0 });
    const monitor = createAlertMonitor(queue, { ttlMs: 30_000 });

    monitor.update(createSnapshot({ network: offline }));
    monitor.update(createSnapshot({ network: offline }));

    expect(queue.items()).toEqual([{ id: 1, text: OFFLINE_ALERT, priority: 1, expiresAt: 30_000 }]);
  });

  it("pushes the alert again after its previous push expired", () => {
    let time = 0;
    const queue = createMessageQueue({ now: () => time });
    const monitor = createAlertMonitor(queue, { ttlMs: 30_000 });

    monitor.update(createSnapshot({ network: offline }));
    time = 30_000;
    monitor.update(createSnapshot({ network: offline }));

    expect(queue.items()).toEqual([{ id: 2, text: OFFLINE_ALERT, priority: 1, expiresAt: 60_000 }]);
  });

  it("replaces the alert when it changes", () => {
    const queue = createMessageQueue({ now: () => 0 });
    const monitor = createAlertMonitor(queue, { ttlMs: 30_000 });

    monitor.update(createSnapshot({ network: offline }));
    const alert = monitor.update(createSnapshot({ weather: staleWeather }));

    expect(alert).toBe(STALE_WEATHER_ALERT);
    expect(queue.items().map((item) => item.text)).toEqual([STALE_WEATHER_ALERT]);
  });

  it("withdraws the alert once the condition clears", () => {
    const queue = createMessageQueue({ now: () => 0 });
    queue.push("quote", 600_000, 20);
    const monitor = createAlertMonitor(queue, { ttlMs: 30_000 });

    monitor.update(createSnapshot({ network: offline }));
    expect(queue.current()).toBe(OFFLINE_ALERT);
    monitor.update(createSnapshot());

    expect(queue.current()).toBe("quote");
    expect(queue.size()).toBe(1);
  });
});
