import { z } from "zod";
import { buildUrl, fetchJson, type FetchFn } from "./api-fetch.js";
import { RemoteDataError } from "./errors.js";

export const WEATHER_SUCCESS_CODE = "200";

export interface LocationQuery {
  text: string;
  range: string;
  number: number;
}

export interface LocationMatch {
  id: string;
  name: string;
}

export interface CurrentConditions {
  tempC: string;
  text: string;
  icon: string;
  obsTime: string;
  updateTime: string;
}

export interface DailyForecast {
  date: string;
  textDay: string;
  tempMax: string;
  tempMin: string;
  iconDay: string;
}

export interface WeatherResult {
  current: CurrentConditions;
  /** Null when the forecast round-trip failed; the current conditions are still valid. */
  daily: DailyForecast[] | null;
  forecastError?: string;
}

export interface WeatherClient {
  resolveLocation(query: LocationQuery, signal?: AbortSignal): Promise<LocationMatch>;
  fetchWeather(locationId: string, signal?: AbortSignal): Promise<WeatherResult>;
}

export interface WeatherClientOptions {
  host: string;
  apiKey: string;
  timeoutMs: number;
  lang: string;
  unit: string;
  fetch?: FetchFn;
}

const field = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .optional()
  .transform((value) => value ?? "-");

const statusSchema = z.object({
  code: z.union([z.string(), z.number()]).transform((value) => String(value))
});

const geoSchema = z.object({
  location: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().optional()
      })
    )
    .min(1)
});

const nowSchema = z.object({
  updateTime: field,
  now: z.object({
    temp: field,
    text: field,
    icon: field,
    obsTime: field
  })
});

const dailySchema = z.object({
  daily: z.array(
    z.object({
      fxDate: field,
      textDay: field,
      tempMax: field,
      tempMin: field,
      iconDay: field
    })
  )
});

function isPlaceholder(value: string): boolean {
  return value.trim().length === 0 || value.includes("YOUR_");
}

function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "unexpected shape";
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

function parseBody<S extends z.ZodTypeAny>(
  label: string,
  body: unknown,
  schema: S,
  url: string
): z.output<S> {
  const status = statusSchema.safeParse(body);
  if (!status.success) {
    throw new RemoteDataError(`${label} failed: missing status code`, { kind: "protocol", url });
  }
  if (status.data.code !== WEATHER_SUCCESS_CODE) {
    throw new RemoteDataError(`${label} failed: ${status.data.code}`, { kind: "protocol", url });
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new RemoteDataError(`${label} failed: ${describeIssues(parsed.error)}`, {
      kind: "protocol",
      url
    });
  }
  return parsed.data;
}

export function createWeatherClient(options: WeatherClientOptions): WeatherClient {
  function assertConfigured(): void {
    if (isPlaceholder(options.host)) {
      throw new RemoteDataError("Weather API host not configured (set weather.host)", {
        kind: "configuration"
      });
    }
    if (isPlaceholder(options.apiKey)) {
      throw new RemoteDataError("Weather API key not configured (set weather.apiKey)", {
        kind: "configuration"
      });
    }
  }

  async function get(path: string, params: Record<string, string | number>, signal?: AbortSignal) {
    assertConfigured();
    const base = /^https?:\/\//.test(options.host) ? options.host : `https://${options.host.trim()}`;
    const url = buildUrl(base, path, params);
    const body = await fetchJson(url, {
      timeoutMs: options.timeoutMs,
      headers: { "X-QW-Api-Key": options.apiKey.trim() },
      signal,
      fetch: options.fetch
    });
    return { url, body };
  }

  async function fetchForecast(locationId: string, signal?: AbortSignal): Promise<DailyForecast[]> {
    const { url, body } = await get(
      "/v7/weather/7d",
      { location: locationId, lang: options.lang, unit: options.unit },
      signal
    );
    const parsed = parseBody("Weather 7d", body, dailySchema, url);
    return parsed.daily.map((item) => ({
      date: item.fxDate,
      textDay: item.textDay,
      tempMax: item.tempMax,
      tempMin: item.tempMin,
      iconDay: item.iconDay
    }));
  }

  return {
    async resolveLocation(query, signal) {
      const { url, body } = await get(
        "/geo/v2/city/lookup",
        { location: query.text, lang: options.lang, range: query.range, number: query.number },
        signal
      );
      const parsed = parseBody("Geo lookup", body, geoSchema, url);
      const first = parsed.location[0];
      return { id: first.id, name: first.name ?? query.text };
    },

    async fetchWeather(locationId, signal) {
      const { url, body } = await get(
        "/v7/weather/now",
        { location: locationId, lang: options.lang, unit: options.unit },
        signal
      );
      const parsed = parseBody("Weather now", body, nowSchema, url);
      const current: CurrentConditions = {
        tempC: parsed.now.temp,
        text: parsed.now.text,
        icon: parsed.now.icon,
        obsTime: parsed.now.obsTime,
        updateTime: parsed.updateTime
      };

      try {
        return { current, daily: await fetchForecast(locationId, signal) };
      } catch (error) {
        if (signal?.aborted) throw error;
        const message = error instanceof Error ? error.message : String(error);
        return { current, daily: null, forecastError: message };
      }
    }
  };
}
