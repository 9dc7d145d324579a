import { Candidate, EventMarkets, FilterResult, Odds, RejectionTally } from "./types";
import { eventSlug, tickerBase } from "./links";
import { hoursUntil, parseTimestamp, toEpochSeconds } from "./time";

export interface FilterThresholds {
  minYesPriceCents: number;
  minSpreadCents: number;
  minVolume24h: number;
  maxHoursToClose: number;
}

export interface FilterOptions extends FilterThresholds {
  now: Date;
  /** Overrides `now + maxHoursToClose` as the latest acceptable close. */
  maxCloseTs?: number;
}

export function emptyTally(): RejectionTally {
  return { noOdds: 0, price: 0, spread: 0, expiration: 0, volume: 0 };
}

export function totalRejected(tally: RejectionTally): number {
  return tally.noOdds + tally.price + tally.spread + tally.expiration + tally.volume;
}

export function resolveMaxCloseTs(now: Date, maxHoursToClose: number, override?: number): number {
  return override ?? toEpochSeconds(now) + Math.floor(maxHoursToClose * 3600);
}

export function roiFor(yesBid: number): { roiCents: number; roiPct: number } {
  const roiCents = Math.max(0, 100 - yesBid);
  const roiPct = yesBid ? (roiCents / yesBid) * 100 : 0;
  return { roiCents, roiPct };
}

/**
 * Applies the high-confidence predicates to every market, in order:
 * odds present → price floor → spread floor → close window → volume floor.
 * A market is tallied under the first predicate it fails.
 */
export function filterCandidates(
  eventMarkets: Map<string, EventMarkets>,
  oddsByTicker: Map<string, Odds>,
  opts: FilterOptions
): FilterResult {
  const nowTs = toEpochSeconds(opts.now);
  const maxCloseTs = resolveMaxCloseTs(opts.now, opts.maxHoursToClose, opts.maxCloseTs);

  const candidates: Candidate[] = [];
  const rejects = emptyTally();
  let totalMarkets = 0;

  for (const [eventTicker, { event, markets }] of eventMarkets) {
    const slug = eventSlug(eventTicker);

    for (const market of markets) {
      const ticker = market.ticker;
      if (!ticker) continue;
      totalMarkets++;

      const odds = oddsByTicker.get(ticker);
      if (!odds || odds.yesBid === null || odds.yesAsk === null) {
        rejects.noOdds++;
        continue;
      }

      const { yesBid, yesAsk } = odds;
      if (yesBid < opts.minYesPriceCents) {
        rejects.price++;
        continue;
      }

      const spread = yesAsk - yesBid;
      if (spread < opts.minSpreadCents) {
        rejects.spread++;
        continue;
      }

      const closeTs = parseTimestamp(odds.closeTime || market.closeTime);
      if (closeTs === null || closeTs <= nowTs || closeTs > maxCloseTs) {
        rejects.expiration++;
        continue;
      }

      // Event-level volume counts too: thin markets inside a busy event pass
      const marketVolume = Math.max(market.volume24h, market.volume, odds.volume);
      if (Math.max(event.volume24h, marketVolume) < opts.minVolume24h) {
        rejects.volume++;
        continue;
      }

      candidates.push({
        ticker,
        tickerBase: tickerBase(ticker),
        eventTicker,
        eventSlug: slug,
        eventTitle: event.title || "N/A",
        marketTitle: market.title || "N/A",
        marketSubtitle: market.subtitle,
        yesBid,
        yesAsk,
        spread,
        hoursToClose: hoursUntil(closeTs, opts.now),
        closeTs,
        eventVolume24h: event.volume24h,
        marketVolume,
        ...roiFor(yesBid),
      });
    }
  }

  return { candidates, rejects, totalMarkets };
}
