import { createLogger } from "./logger";
import { buildMarketUrl } from "./links";
import { formatHours, hoursUntil } from "./time";
import { Candidate, NotificationChannel } from "./types";

const log = createLogger("notifier");

export interface NotifyOptions {
  chatId: string | null;
  maxNotifications: number;
  now?: Date;
}

export type NotifyResult =
  | { status: "disabled" }
  | { status: "no-candidates" }
  | { status: "sent"; sent: number; failed: number; duplicates: number };

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatVolume(value: number): string {
  return Math.round(value).toLocaleString("en-US");
}

export function outcomeLabel(candidate: Candidate): string {
  return candidate.marketSubtitle || candidate.marketTitle;
}

/** One (event, outcome) pair per run; the ticker stands in for a missing outcome label. */
export function dedupKey(candidate: Candidate): string {
  return JSON.stringify([candidate.eventTicker, candidate.marketSubtitle || candidate.ticker]);
}

/**
 * Hours are recomputed at send time when `now` is given, so a message sent
 * late in a slow run still shows the real time left.
 */
export function formatMarketMessage(candidate: Candidate, now?: Date): string {
  const outcome = outcomeLabel(candidate);
  const url = buildMarketUrl(candidate.ticker, candidate.eventTicker, outcome, candidate.tickerBase);
  const hours = now ? hoursUntil(candidate.closeTs, now) : candidate.hoursToClose;

  return [
    `🎯 <a href="${escapeHtml(url)}">${escapeHtml(candidate.eventTitle)}</a>`,
    escapeHtml(outcome),
    ``,
    `Ticker: <code>${escapeHtml(candidate.ticker)}</code>`,
    `Yes bid/ask: ${candidate.yesBid}¢ / ${candidate.yesAsk}¢ (spread ${candidate.spread}¢)`,
    `Expected return: ${candidate.roiCents}¢ (${candidate.roiPct.toFixed(1)}%)`,
    `Closes in: ${formatHours(hours)}`,
    `24h volume: ${formatVolume(Math.max(candidate.eventVolume24h, candidate.marketVolume))}`,
  ].join("\n");
}

/**
 * Sends ranked candidates until `maxNotifications` deliveries have succeeded.
 * Failed sends are logged and do not use up a slot; the pair is still marked
 * as seen so a lower-ranked duplicate is not tried in its place.
 */
export async function notifyCandidates(
  candidates: readonly Candidate[],
  channel: NotificationChannel | null,
  opts: NotifyOptions
): Promise<NotifyResult> {
  if (!channel || !opts.chatId) return { status: "disabled" };

  if (candidates.length === 0) {
    log.info("Telegram skipped: no qualifying markets this run");
    return { status: "no-candidates" };
  }

  const limit = Math.min(candidates.length, opts.maxNotifications);
  log.info(`Sending up to ${limit} Telegram notification(s)`);

  const seen = new Set<string>();
  let sent = 0;
  let failed = 0;
  let duplicates = 0;

  for (const candidate of candidates) {
    if (sent >= limit) break;

    const key = dedupKey(candidate);
    if (seen.has(key)) {
      duplicates++;
      continue;
    }
    seen.add(key);

    const result = await channel.send(opts.chatId, formatMarketMessage(candidate, opts.now), "HTML");
    if (result.ok) {
      sent++;
      log.info(`Telegram alert sent for ${candidate.ticker}`);
    } else {
      failed++;
      log.error(`Telegram failed for ${candidate.ticker}`, { error: result.error });
    }
  }

  return { status: "sent", sent, failed, duplicates };
}
