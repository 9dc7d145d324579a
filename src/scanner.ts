import { EventMarkets, KalshiEvent, MarketSummary } from "./types";
import { KalshiRawMarket } from "./kalshi/types";

function toSummary(raw: KalshiRawMarket): MarketSummary {
  return {
    ticker: raw.ticker || "",
    title: raw.title || "",
    subtitle: raw.subtitle || raw.yes_sub_title || "",
    volume: raw.volume ?? 0,
    volume24h: raw.volume_24h ?? 0,
    closeTime: raw.close_time || "",
  };
}

/**
 * Flattens events into `eventTicker → { event, markets }`, keeping at most
 * `maxMarketsPerEvent` markets each. Events without a ticker or without
 * markets are dropped. Iteration order follows the input.
 */
export function normalizeEvents(events: KalshiEvent[], maxMarketsPerEvent: number): Map<string, EventMarkets> {
  const eventMarkets = new Map<string, EventMarkets>();

  for (const event of events) {
    if (!event.ticker) continue;

    const markets = event.markets.slice(0, Math.max(0, maxMarketsPerEvent)).map(toSummary);
    if (markets.length === 0) continue;

    eventMarkets.set(event.ticker, { event, markets });
  }

  return eventMarkets;
}

/** Keeps the `maxEvents` events with the highest 24h volume; equal volumes keep their order. */
export function selectTopEvents(eventMarkets: Map<string, EventMarkets>, maxEvents: number): Map<string, EventMarkets> {
  if (eventMarkets.size <= maxEvents) return eventMarkets;

  const sorted = [...eventMarkets.entries()].sort(([, a], [, b]) => b.event.volume24h - a.event.volume24h);
  return new Map(sorted.slice(0, Math.max(0, maxEvents)));
}

export function countMarkets(eventMarkets: Map<string, EventMarkets>): number {
  let total = 0;
  for (const { markets } of eventMarkets.values()) total += markets.length;
  return total;
}
