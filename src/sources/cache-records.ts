import { z } from "zod";
import type { ParseFn } from "@deskpanel/state-cache";

const str = z.union([z.string(), z.number()]).transform((value) => String(value));

export const geoCacheSchema = z.object({
  location_id: z.string().min(1),
  location_name: z.string(),
  ts: z.number()
});

export const weatherNowSchema = z.object({
  location_id: z.string(),
  location_name: z.string(),
  temp_c: str,
  text: str,
  icon: str,
  obs_time: str,
  update_time: str,
  last_ok_ts: z.number()
});

export const forecastCacheSchema = z.object({
  location_id: z.string(),
  location_name: z.string(),
  daily: z.array(
    z.object({
      date: str,
      text_day: str,
      temp_max: str,
      temp_min: str,
      icon_day: str
    })
  )
});

export type GeoCacheEntry = z.infer<typeof geoCacheSchema>;
export type WeatherNowEntry = z.infer<typeof weatherNowSchema>;
export type ForecastCacheEntry = z.infer<typeof forecastCacheSchema>;

export function parserFor<S extends z.ZodTypeAny>(schema: S): ParseFn<z.output<S>> {
  return (raw) => {
    const parsed = schema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  };
}
