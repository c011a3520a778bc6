import { describe, it, expect, vi } from "vitest";
import type { FetchFn } from "./api-fetch.js";
import { createWeatherClient } from "./weather-client.js";

type Routes = Record<string, unknown>;

function routeFetch(routes: Routes) {
  return vi.fn<FetchFn>(async (input) => {
    const url = new URL(String(input));
    if (!(url.pathname in routes)) {
      return new Response("not found", { status: 404, statusText: "Not Found" });
    }
    return Response.json(routes[url.pathname]);
  });
}

const options = {
  host: "devapi.example.com",
  apiKey: "test-key",
  timeoutMs: 5000,
  lang: "zh",
  unit: "m"
};

const nowBody = {
  code: "200",
  updateTime: "2026-10-19T08:05+08:00",
  now: { temp: "18", text: "多云", icon: "101", obsTime: "2026-10-19T08:00+08:00" }
};

const forecastBody = {
  code: "200",
  daily: [
    { fxDate: "2026-10-19", textDay: "多云", tempMax: "22", tempMin: 12, iconDay: "101" },
    { fxDate: "2026-10-20", textDay: "晴", tempMax: "24", tempMin: "13" }
  ]
};

describe("createWeatherClient", () => {
  it("looks up a location with the key header", async () => {
    const fetch = routeFetch({
      "/geo/v2/city/lookup": { code: "200", location: [{ id: "101010100", name: "北京" }] }
    });
    const client = createWeatherClient({ ...options, fetch });

    const match = await client.resolveLocation({ text: "Beijing", range: "cn", number: 1 });

    expect(match).toEqual({ id: "101010100", name: "北京" });
    expect(fetch).toHaveBeenCalledOnce();
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(
      "https://devapi.example.com/geo/v2/city/lookup?location=Beijing&lang=zh&range=cn&number=1"
    );
    expect(init?.headers).toMatchObject({ "X-QW-Api-Key": "test-key" });
  });

  it("fails the lookup when the status code is not a success", async () => {
    const fetch = routeFetch({ "/geo/v2/city/lookup": { code: "404" } });
    const client = createWeatherClient({ ...options, fetch });

    await expect(client.resolveLocation({ text: "Atlantis", range: "cn", number: 1 })).rejects.toMatchObject({
      kind: "protocol",
      message: "Geo lookup failed: 404"
    });
  });

  it("fails the lookup when no location matches", async () => {
    const fetch = routeFetch({ "/geo/v2/city/lookup": { code: "200", location: [] } });
    const client = createWeatherClient({ ...options, fetch });

    await expect(client.resolveLocation({ text: "Nowhere", range: "cn", number: 1 })).rejects.toThrow(
      "Geo lookup failed: location"
    );
  });

  it("returns current conditions and the daily forecast", async () => {
    const fetch = routeFetch({ "/v7/weather/now": nowBody, "/v7/weather/7d": forecastBody });
    const client = createWeatherClient({ ...options, fetch });

    const result = await client.fetchWeather("101010100");

    expect(result).toEqual({
      current: {
        tempC: "18",
        text: "多云",
        icon: "101",
        obsTime: "2026-10-19T08:00+08:00",
        updateTime: "2026-10-19T08:05+08:00"
      },
      daily: [
        { date: "2026-10-19", textDay: "多云", tempMax: "22", tempMin: "12", iconDay: "101" },
        { date: "2026-10-20", textDay: "晴", tempMax: "24", tempMin: "13", iconDay: "-" }
      ]
    });
    expect(String(fetch.mock.calls[0][0])).toBe(
      "https://devapi.example.com/v7/weather/now?location=101010100&lang=zh&unit=m"
    );
  });

  it("keeps current conditions when only the forecast fails", async () => {
    const fetch = routeFetch({ "/v7/weather/now": nowBody, "/v7/weather/7d": { code: "402" } });
    const client = createWeatherClient({ ...options, fetch });

    const result = await client.fetchWeather("101010100");

    expect(result.current.tempC).toBe("18");
    expect(result.daily).toBeNull();
    expect(result.forecastError).toBe("Weather 7d failed: 402");
  });

  it("fails when current conditions report a non-success code", async () => {
    const fetch = routeFetch({ "/v7/weather/now": { code: "401" } });
    const client = createWeatherClient({ ...options, fetch });

    await expect(client.fetchWeather("101010100")).rejects.toMatchObject({
      kind: "protocol",
      message: "Weather now failed: 401"
    });
  });

  it("fails when the current conditions block is missing", async () => {
    const fetch = routeFetch({ "/v7/weather/now": { code: "200", updateTime: "x" } });
    const client = createWeatherClient({ ...options, fetch });

    await expect(client.fetchWeather("101010100")).rejects.toThrow("Weather now failed: now");
  });

  it("raises a configuration error for a placeholder host without calling the API", async () => {
    const fetch = routeFetch({});
    const client = createWeatherClient({ ...options, host: "YOUR_HOST.example.com", fetch });

    await expect(client.fetchWeather("101010100")).rejects.toMatchObject({
      kind: "configuration",
      message: "Weather API host not configured (set weather.host)"
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("raises a configuration error for a missing key", async () => {
    const client = createWeatherClient({ ...options, apiKey: " " });

    await expect(client.resolveLocation({ text: "Beijing", range: "cn", number: 1 })).rejects.toMatchObject({
      kind: "configuration",
      message: "Weather API key not configured (set weather.apiKey)"
    });
  });
});
