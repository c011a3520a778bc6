import { z } from "zod";
import { buildUrl, fetchJson, type FetchFn } from "./api-fetch.js";
import { RemoteDataError } from "./errors.js";

export const TEXT_SUCCESS_CODE = 200;

export interface LunarInfo {
  solar: string;
  lunar: string;
  week: string;
  ganzhiYear: string;
  ganzhiMonth: string;
  ganzhiDay: string;
  constellation: string;
  yi: string;
  ji: string;
}

export interface ShortTextRequest {
  endpoint: string;
  params?: Record<string, string | number>;
}

export interface TextClient {
  fetchShortText(request: ShortTextRequest, signal?: AbortSignal): Promise<string>;
  fetchLunar(signal?: AbortSignal): Promise<LunarInfo>;
}

export interface TextClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  fetch?: FetchFn;
}

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? "" : String(value).trim()));

const envelopeSchema = z.object({
  code: z.union([z.string(), z.number()]),
  data: z.unknown()
});

const shortTextSchema = z.object({ text, cn: text });

const lunarSchema = z.object({
  Solar: text,
  Lunar: text,
  Week: text,
  GanZhiYear: text,
  GanZhiMonth: text,
  GanZhiDay: text,
  Constellation: text,
  YiDay: text,
  JiDay: text
});

const orDash = (value: string): string => value || "-";

export function createTextClient(options: TextClientOptions): TextClient {
  async function request(
    label: string,
    endpoint: string,
    params: Record<string, string | number>,
    signal?: AbortSignal
  ): Promise<{ url: string; data: unknown }> {
    if (!options.apiKey.trim()) {
      throw new RemoteDataError("Text API key not configured (set text.apiKey)", {
        kind: "configuration"
      });
    }
    const url = buildUrl(options.baseUrl, endpoint, { key: options.apiKey.trim(), ...params });
    const body = await fetchJson(url, { timeoutMs: options.timeoutMs, signal, fetch: options.fetch });
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new RemoteDataError(`${label} failed: missing status code`, { kind: "protocol", url });
    }
    if (String(envelope.data.code) !== String(TEXT_SUCCESS_CODE)) {
      throw new RemoteDataError(`${label} failed: ${String(envelope.data.code)}`, {
        kind: "protocol",
        url
      });
    }
    return { url, data: envelope.data.data };
  }

  return {
    async fetchShortText({ endpoint, params = {} }, signal) {
      const { url, data } = await request("Text", endpoint, params, signal);
      const parsed = shortTextSchema.safeParse(data);
      if (!parsed.success) {
        throw new RemoteDataError("Text failed: missing data", { kind: "protocol", url });
      }
      const joined = [parsed.data.text, parsed.data.cn].filter(Boolean).join(" ");
      if (!joined) {
        throw new RemoteDataError("Text failed: empty text", { kind: "protocol", url });
      }
      return joined;
    },

    async fetchLunar(signal) {
      const { url, data } = await request("Lunar", "lunars/lunarpro", {}, signal);
      const parsed = lunarSchema.safeParse(data);
      if (!parsed.success) {
        throw new RemoteDataError("Lunar failed: missing data", { kind: "protocol", url });
      }
      const info = parsed.data;
      return {
        solar: orDash(info.Solar),
        lunar: orDash(info.Lunar),
        week: orDash(info.Week),
        ganzhiYear: orDash(info.GanZhiYear),
        ganzhiMonth: orDash(info.GanZhiMonth),
        ganzhiDay: orDash(info.GanZhiDay),
        constellation: orDash(info.Constellation),
        yi: orDash(info.YiDay),
        ji: orDash(info.JiDay)
      };
    }
  };
}
