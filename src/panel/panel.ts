import {
  createPoller,
  createReachabilityPoller,
  sleep as defaultSleep,
  type Poller,
  type PollerLogger,
  type ProbeFn,
  type SleepFn
} from "@deskpanel/poller";
import {
  createJsonStore,
  resolveStateDir,
  type DiskCacheFs,
  type JsonStore
} from "@deskpanel/state-cache";
import { createMessageQueue, type MessageQueue } from "@deskpanel/ticker-queue";
import type { z } from "zod";
import type { DeskpanelConfig } from "../config/schema.js";
import type { FetchFn } from "../services/api-fetch.js";
import { createTextClient, type LunarInfo } from "../services/text-client.js";
import { createWeatherClient } from "../services/weather-client.js";
import {
  forecastCacheSchema,
  geoCacheSchema,
  parserFor,
  weatherNowSchema
} from "../sources/cache-records.js";
import { createLunarFeed, createQuoteFeed, EMPTY_LUNAR } from "../sources/text-sources.js";
import { createWeatherSource, EMPTY_WEATHER, type WeatherReport } from "../sources/weather-source.js";
import { createSnapshotBuilder, type SnapshotBuilder } from "../snapshot/builder.js";
import { createSystemMetrics, type SystemMetrics } from "../snapshot/system-metrics.js";

export interface PanelDeps {
  logger: PollerLogger;
  fetch?: FetchFn;
  fs?: DiskCacheFs;
  sleep?: SleepFn;
  now?: () => number;
  homedir?: () => string;
  probe?: ProbeFn;
  resolveIp?: () => string;
  metrics?: SystemMetrics;
}

export interface Panel {
  readonly builder: SnapshotBuilder;
  readonly queue: MessageQueue;
  readonly pollers: readonly Poller<unknown>[];
  /** Resolves once every poller has stopped. */
  start(signal?: AbortSignal): Promise<void>;
  stop(): Promise<void>;
}

const ms = (seconds: number): number => Math.round(seconds * 1000);

export function createPanel(config: DeskpanelConfig, deps: PanelDeps): Panel {
  const { logger } = deps;
  const now = deps.now ?? Date.now;
  const pollerDeps = { sleep: deps.sleep ?? defaultSleep, now, logger };
  const stateDir = resolveStateDir(config.paths.stateDir, { homedir: deps.homedir });

  function store<S extends z.ZodTypeAny>(fileName: string, schema: S): JsonStore<z.output<S>> {
    return createJsonStore({
      dir: stateDir,
      fileName,
      fs: deps.fs,
      parse: parserFor(schema),
      onError: (error, context) => {
        logger.warn(`cache ${context.operation} failed for ${context.path} (${error.message})`);
      }
    });
  }

  const queue = createMessageQueue({ now });

  const weatherClient = createWeatherClient({
    host: config.weather.host,
    apiKey: config.weather.apiKey,
    timeoutMs: ms(config.weather.timeoutSeconds),
    lang: config.weather.lang,
    unit: config.weather.unit,
    fetch: deps.fetch
  });
  const textClient = createTextClient({
    baseUrl: config.text.baseUrl,
    apiKey: config.text.apiKey,
    timeoutMs: ms(config.text.timeoutSeconds),
    fetch: deps.fetch
  });

  const weatherSource = createWeatherSource({
    client: weatherClient,
    lookup: config.weather.lookup,
    stores: {
      geo: store(config.paths.geoCache, geoCacheSchema),
      now: store(config.paths.weatherCache, weatherNowSchema),
      forecast: store(config.paths.forecastCache, forecastCacheSchema)
    },
    now,
    logger
  });
  const quoteFeed = createQuoteFeed({
    client: textClient,
    quoteType: config.text.quoteType,
    queue,
    ttlMs: ms(config.text.quoteRefreshSeconds)
  });
  const lunarFeed = createLunarFeed(textClient);

  const network = createReachabilityPoller({
    host: config.network.host,
    port: config.network.port,
    timeoutMs: ms(config.network.timeoutSeconds),
    refreshIntervalMs: ms(config.network.refreshSeconds),
    deps: { ...pollerDeps, probe: deps.probe, resolveIp: deps.resolveIp }
  });
  const weather = createPoller<WeatherReport>({
    name: "weather",
    fetch: (signal) => weatherSource.fetch(signal),
    persist: (report) => weatherSource.persist(report),
    preload: () => weatherSource.preload(),
    initialValue: EMPTY_WEATHER,
    refreshIntervalMs: ms(config.weather.refreshSeconds),
    backoffFloorMs: ms(config.weather.backoffFloorSeconds),
    backoffCeilingMs: ms(config.weather.backoffCeilingSeconds),
    deps: pollerDeps
  });
  const textBackoff = {
    backoffFloorMs: ms(config.text.backoffFloorSeconds),
    backoffCeilingMs: ms(config.text.backoffCeilingSeconds)
  };
  const quote = createPoller<string>({
    name: "quote",
    fetch: (signal) => quoteFeed.fetch(signal),
    onSuccess: (text) => quoteFeed.onSuccess(text),
    initialValue: "",
    refreshIntervalMs: ms(config.text.quoteRefreshSeconds),
    ...textBackoff,
    deps: pollerDeps
  });
  const lunar = createPoller<LunarInfo>({
    name: "lunar",
    fetch: (signal) => lunarFeed.fetch(signal),
    initialValue: EMPTY_LUNAR,
    refreshIntervalMs: ms(config.text.lunarRefreshSeconds),
    ...textBackoff,
    deps: pollerDeps
  });

  const builder = createSnapshotBuilder({
    network,
    weather,
    quote,
    lunar,
    metrics: deps.metrics ?? createSystemMetrics(),
    now: () => new Date(now())
  });
  const pollers: readonly Poller<unknown>[] = [network, weather, quote, lunar];

  return {
    builder,
    queue,
    pollers,
    async start(signal) {
      await Promise.all(pollers.map((poller) => poller.start(signal)));
    },
    async stop() {
      await Promise.all(pollers.map((poller) => poller.stop()));
    }
  };
}
