import { createLogger } from "./logger";
import { DEFAULTS } from "./config";
import { settleInBatches } from "./batch";
import { EventMarkets, MarketDataGateway, Odds } from "./types";

const log = createLogger("odds");

export interface FetchOddsOptions {
  batchSize?: number;
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** Distinct tickers in event/market order. */
export function collectTickers(eventMarkets: Map<string, EventMarkets>): string[] {
  const seen = new Set<string>();
  for (const { markets } of eventMarkets.values()) {
    for (const market of markets) {
      if (market.ticker) seen.add(market.ticker);
    }
  }
  return [...seen];
}

/**
 * Pulls an odds snapshot for every ticker. Tickers whose call fails or comes
 * back empty are left out of the map; they surface later as "no odds".
 */
export async function fetchOdds(
  gateway: MarketDataGateway,
  eventMarkets: Map<string, EventMarkets>,
  opts: FetchOddsOptions = {}
): Promise<Map<string, Odds>> {
  const tickers = collectTickers(eventMarkets);
  const oddsByTicker = new Map<string, Odds>();

  log.info(`Fetching odds for ${tickers.length} markets`);

  const results = await settleInBatches(tickers, (ticker) => gateway.getOdds(ticker), {
    batchSize: opts.batchSize ?? DEFAULTS.oddsBatchSize,
    pauseMs: opts.pauseMs ?? DEFAULTS.oddsBatchPauseMs,
    sleep: opts.sleep,
    onProgress: (settled, total) => log.debug("Odds progress", { settled, total }),
  });

  for (const { key: ticker, result } of results) {
    if (!result.ok) {
      const reason = result.error instanceof Error ? result.error.message : String(result.error);
      log.warn(`Failed to load odds for ${ticker}`, { error: reason });
      continue;
    }
    if (!result.value) {
      log.warn(`No odds returned for ${ticker}`);
      continue;
    }
    oddsByTicker.set(ticker, result.value);
  }

  log.info(`Loaded odds for ${oddsByTicker.size} markets`, { failed: tickers.length - oddsByTicker.size });
  return oddsByTicker;
}
