import type { MessageQueue } from "@deskpanel/ticker-queue";
import type { LunarInfo, TextClient } from "../services/text-client.js";

export const QUOTE_PRIORITY = 20;

export const EMPTY_LUNAR: LunarInfo = {
  solar: "-",
  lunar: "-",
  week: "-",
  ganzhiYear: "-",
  ganzhiMonth: "-",
  ganzhiDay: "-",
  constellation: "-",
  yi: "-",
  ji: "-"
};

export interface QuoteFeedOptions {
  client: TextClient;
  quoteType: number;
  queue: MessageQueue;
  /** How long a fetched quote stays on the ticker; normally the refresh interval. */
  ttlMs: number;
  priority?: number;
}

export interface QuoteFeed {
  fetch(signal: AbortSignal): Promise<string>;
  onSuccess(quote: string): void;
}

export function createQuoteFeed(options: QuoteFeedOptions): QuoteFeed {
  const priority = options.priority ?? QUOTE_PRIORITY;
  return {
    fetch: (signal) =>
      options.client.fetchShortText(
        { endpoint: "randtext/get", params: { type: options.quoteType, m: "" } },
        signal
      ),
    onSuccess(quote) {
      options.queue.push(quote, options.ttlMs, priority);
    }
  };
}

export function createLunarFeed(client: TextClient): { fetch(signal: AbortSignal): Promise<LunarInfo> } {
  return {
    fetch: (signal) => client.fetchLunar(signal)
  };
}
