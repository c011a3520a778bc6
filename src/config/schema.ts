import { z } from "zod";

const seconds = z.number().positive();

const pathsSchema = z
  .object({
    stateDir: z.string().min(1).default("~/.deskpanel"),
    geoCache: z.string().min(1).default("geo_cache.json"),
    weatherCache: z.string().min(1).default("weather_now.json"),
    forecastCache: z.string().min(1).default("forecast_cache.json")
  })
  .default({});

const lookupSchema = z
  .object({
    locationText: z.string().default(""),
    locationId: z.string().optional(),
    range: z.string().default("cn"),
    number: z.number().int().min(1).default(1)
  })
  .default({});

const weatherSchema = z
  .object({
    host: z.string().default(""),
    apiKey: z.string().default(""),
    lang: z.string().default("zh"),
    unit: z.enum(["m", "i"]).default("m"),
    timeoutSeconds: seconds.default(8),
    refreshSeconds: seconds.default(600),
    backoffFloorSeconds: seconds.default(5),
    backoffCeilingSeconds: seconds.default(300),
    lookup: lookupSchema
  })
  .default({});

const textSchema = z
  .object({
    baseUrl: z.string().url().default("https://api.shwgij.com/api"),
    apiKey: z.string().default(""),
    timeoutSeconds: seconds.default(2),
    quoteType: z.number().int().default(5),
    quoteRefreshSeconds: seconds.default(600),
    lunarRefreshSeconds: seconds.default(3600),
    backoffFloorSeconds: seconds.default(5),
    backoffCeilingSeconds: seconds.default(300)
  })
  .default({});

const networkSchema = z
  .object({
    host: z.string().min(1).default("1.1.1.1"),
    port: z.number().int().min(1).max(65535).default(53),
    timeoutSeconds: seconds.default(1.5),
    refreshSeconds: seconds.default(10)
  })
  .default({});

export const PAGE_NAMES = ["clock", "weather", "status", "quotes", "lunar"] as const;
export type PageName = (typeof PAGE_NAMES)[number];

const displaySchema = z
  .object({
    columns: z.number().int().min(20).default(40),
    pages: z.array(z.enum(PAGE_NAMES)).min(1).default(["clock", "weather", "status", "lunar"]),
    pageCycleSeconds: seconds.default(12),
    tickSeconds: seconds.default(1)
  })
  .default({});

const tickerSchema = z
  .object({
    fallbackText: z.string().default("deskpanel"),
    alertTtlSeconds: seconds.default(30)
  })
  .default({});

const reminderSchema = z.object({
  time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM"),
  text: z.string().min(1)
});

export const configSchema = z
  .object({
    paths: pathsSchema,
    weather: weatherSchema,
    text: textSchema,
    network: networkSchema,
    display: displaySchema,
    ticker: tickerSchema,
    reminders: z.array(reminderSchema).default([])
  })
  .refine((config) => config.weather.backoffCeilingSeconds >= config.weather.backoffFloorSeconds, {
    message: "must be >= weather.backoffFloorSeconds",
    path: ["weather", "backoffCeilingSeconds"]
  })
  .refine((config) => config.text.backoffCeilingSeconds >= config.text.backoffFloorSeconds, {
    message: "must be >= text.backoffFloorSeconds",
    path: ["text", "backoffCeilingSeconds"]
  });

export type DeskpanelConfig = z.output<typeof configSchema>;
export type Reminder = z.output<typeof reminderSchema>;

export function defaultConfig(): DeskpanelConfig {
  return configSchema.parse({});
}
