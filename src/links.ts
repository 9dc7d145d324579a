import { KALSHI_WEB_URL } from "./config";

// Event tickers end in a date, e.g. "kxhighny-24dec31"
const EVENT_DATE_SUFFIX = /-(\d{2}[a-z]{3}\d{2})$/;

/** "KXHIGHNY-24DEC31-B45" → "kxhighny-24dec31" */
export function tickerBase(ticker: string): string {
  const dash = ticker.lastIndexOf("-");
  return (dash >= 0 ? ticker.slice(0, dash) : ticker).toLowerCase();
}

/** "KXHIGHNY-24DEC31" → "kxhighny" */
export function eventSlug(eventTicker: string | null | undefined): string {
  if (!eventTicker) return "market";
  const slug = eventTicker.toLowerCase();
  const m = EVENT_DATE_SUFFIX.exec(slug);
  return m ? slug.slice(0, m.index) : slug;
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "market";
}

export function buildMarketUrl(
  ticker: string,
  eventTicker: string | null,
  outcome: string,
  base: string | null
): string {
  const path = (base || ticker).toLowerCase();
  const event = eventSlug(eventTicker || ticker);
  const outcomeSlug = slugify(outcome || ticker);
  return `${KALSHI_WEB_URL}/${event}/${outcomeSlug}/${path}`;
}
