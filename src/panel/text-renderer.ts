import stringWidth from "string-width";
import type { CachedValue } from "@deskpanel/poller";
import type { PageName } from "../config/schema.js";
import type { Snapshot } from "../snapshot/types.js";
import type { Renderer } from "./types.js";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const FORECAST_DAYS = 3;

export interface TextRendererOptions {
  columns?: number;
}

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** `-` before the first success, `~value` while stale. */
export function marked<T>(cached: Readonly<CachedValue<T>>, format: (value: T) => string): string {
  if (!cached.ok) {
    return "-";
  }
  const text = format(cached.value);
  return cached.stale ? `~${text}` : text;
}

/** Cuts by terminal cells, so wide CJK characters count twice. */
function fit(line: string, columns: number): string {
  if (stringWidth(line) <= columns) return line;
  let width = 0;
  let kept = "";
  for (const char of line) {
    const charWidth = stringWidth(char);
    if (width + charWidth > columns - 1) break;
    kept += char;
    width += charWidth;
  }
  return `${kept}…`;
}

function statusBar(snapshot: Snapshot): string {
  const { now } = snapshot;
  const link = marked(snapshot.network, (value) => (value.reachable ? "online" : "offline"));
  return `${pad2(now.getHours())}:${pad2(now.getMinutes())}  ${snapshot.ip}  ${link}`;
}

function pageBody(page: PageName, snapshot: Snapshot): string[] {
  const { now, weather, lunar } = snapshot;
  switch (page) {
    case "clock":
      return [
        `${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`,
        `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())} ${WEEKDAYS[now.getDay()]}`,
        `lunar ${marked(lunar, (value) => value.lunar)}`
      ];
    case "weather": {
      const lines = [
        marked(weather, (value) => value.locationName),
        `now ${marked(weather, (value) => `${value.current.tempC}°C ${value.current.text}`)}`
      ];
      if (weather.ok) {
        for (const day of weather.value.daily.slice(0, FORECAST_DAYS)) {
          lines.push(`${day.date} ${day.textDay} ${day.tempMin}~${day.tempMax}°C`);
        }
      }
      return lines;
    }
    case "status":
      return [
        `CPU ${snapshot.cpuTemp}  GPU ${snapshot.gpuTemp}`,
        `Load ${snapshot.load1}`,
        `Mem ${snapshot.memoryPercent}  Disk ${snapshot.diskPercent}`,
        `IP ${snapshot.ip}`
      ];
    case "quotes":
      return [marked(snapshot.quote, (value) => value)];
    case "lunar":
      return [
        marked(lunar, (value) => `${value.solar} ${value.week}`),
        marked(lunar, (value) => value.lunar),
        marked(lunar, (value) => `${value.ganzhiYear} ${value.ganzhiMonth} ${value.ganzhiDay}`),
        `宜 ${marked(lunar, (value) => value.yi)}`,
        `忌 ${marked(lunar, (value) => value.ji)}`
      ];
  }
}

/** One line per row, ticker last; lines wider than `columns` are cut. */
export function createTextRenderer(options: TextRendererOptions = {}): Renderer<string> {
  const columns = options.columns ?? 40;
  const rule = "-".repeat(columns);

  return (snapshot, view) =>
    [statusBar(snapshot), rule, ...pageBody(view.page, snapshot), rule, `» ${view.ticker}`]
      .map((line) => fit(line, columns))
      .join("\n");
}
