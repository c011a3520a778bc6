import type { JsonStore } from "@deskpanel/state-cache";
import type { Preloaded } from "@deskpanel/poller";
import { RemoteDataError } from "../services/errors.js";
import type {
  CurrentConditions,
  DailyForecast,
  LocationMatch,
  WeatherClient
} from "../services/weather-client.js";
import type { ForecastCacheEntry, GeoCacheEntry, WeatherNowEntry } from "./cache-records.js";

export interface WeatherReport {
  locationId: string;
  locationName: string;
  current: CurrentConditions;
  daily: DailyForecast[];
}

export const EMPTY_WEATHER: WeatherReport = {
  locationId: "",
  locationName: "-",
  current: { tempC: "-", text: "-", icon: "-", obsTime: "-", updateTime: "-" },
  daily: []
};

export interface WeatherLookup {
  locationId?: string;
  locationText: string;
  range: string;
  number: number;
}

export interface WeatherStores {
  geo: JsonStore<GeoCacheEntry>;
  now: JsonStore<WeatherNowEntry>;
  forecast: JsonStore<ForecastCacheEntry>;
}

export interface WeatherSourceOptions {
  client: WeatherClient;
  lookup: WeatherLookup;
  stores: WeatherStores;
  now?: () => number;
  logger?: { verbose(message: string): void };
}

export interface WeatherSource {
  fetch(signal: AbortSignal): Promise<WeatherReport>;
  persist(report: WeatherReport): Promise<void>;
  preload(): Promise<Preloaded<WeatherReport> | null>;
}

const toSeconds = (ms: number): number => ms / 1000;

export function createWeatherSource(options: WeatherSourceOptions): WeatherSource {
  const { client, lookup, stores } = options;
  const now = options.now ?? Date.now;
  // undefined until the geo cache file has been read once
  let geo: GeoCacheEntry | null | undefined;
  let lastDaily: DailyForecast[] = [];

  async function loadGeo(): Promise<GeoCacheEntry | null> {
    if (geo === undefined) {
      geo = await stores.geo.load();
    }
    return geo;
  }

  async function resolveLocation(signal: AbortSignal): Promise<LocationMatch> {
    const cached = await loadGeo();
    const fallbackName = cached?.location_name ?? (lookup.locationText || "-");
    if (lookup.locationId) {
      return { id: lookup.locationId, name: fallbackName };
    }
    if (cached) {
      return { id: cached.location_id, name: cached.location_name };
    }
    if (!lookup.locationText.trim()) {
      throw new RemoteDataError(
        "Weather location not configured (set weather.lookup.locationText)",
        { kind: "configuration" }
      );
    }

    const match = await client.resolveLocation(
      { text: lookup.locationText, range: lookup.range, number: lookup.number },
      signal
    );
    geo = { location_id: match.id, location_name: match.name, ts: toSeconds(now()) };
    await stores.geo.save(geo);
    return match;
  }

  return {
    async fetch(signal) {
      const location = await resolveLocation(signal);
      const result = await client.fetchWeather(location.id, signal);
      if (result.daily) {
        lastDaily = result.daily;
      } else {
        options.logger?.verbose(
          `weather: keeping previous forecast (${result.forecastError ?? "unavailable"})`
        );
      }
      return {
        locationId: location.id,
        locationName: location.name,
        current: result.current,
        daily: lastDaily
      };
    },

    async persist(report) {
      await stores.now.save({
        location_id: report.locationId,
        location_name: report.locationName,
        temp_c: report.current.tempC,
        text: report.current.text,
        icon: report.current.icon,
        obs_time: report.current.obsTime,
        update_time: report.current.updateTime,
        last_ok_ts: toSeconds(now())
      });
      if (report.daily.length > 0) {
        await stores.forecast.save({
          location_id: report.locationId,
          location_name: report.locationName,
          daily: report.daily.map((day) => ({
            date: day.date,
            text_day: day.textDay,
            temp_max: day.tempMax,
            temp_min: day.tempMin,
            icon_day: day.iconDay
          }))
        });
      }
    },

    async preload() {
      const [current, forecast] = await Promise.all([stores.now.load(), stores.forecast.load()]);
      if (forecast) {
        lastDaily = forecast.daily.map((day) => ({
          date: day.date,
          textDay: day.text_day,
          tempMax: day.temp_max,
          tempMin: day.temp_min,
          iconDay: day.icon_day
        }));
      }
      if (!current) {
        return null;
      }
      return {
        value: {
          locationId: current.location_id,
          locationName: current.location_name,
          current: {
            tempC: current.temp_c,
            text: current.text,
            icon: current.icon,
            obsTime: current.obs_time,
            updateTime: current.update_time
          },
          daily: lastDaily
        },
        savedAt: Math.round(current.last_ok_ts * 1000)
      };
    }
  };
}
