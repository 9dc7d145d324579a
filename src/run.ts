import { createLogger } from "./logger";
import { DEFAULTS, NotifierConfig } from "./config";
import { countMarkets, normalizeEvents, selectTopEvents } from "./scanner";
import { fetchOdds } from "./odds";
import { filterCandidates, emptyTally } from "./filter";
import { rankCandidates } from "./ranker";
import { notifyCandidates, NotifyResult } from "./notifier";
import { formatFilterSummary, printCandidateTable } from "./reporter";
import { Candidate, MarketDataGateway, NotificationChannel, RejectionTally } from "./types";

const log = createLogger("run");

// ─── State machine ───

export type RunStage =
  | "init"
  | "events-fetched"
  | "markets-normalized"
  | "odds-fetched"
  | "filtered"
  | "notified"
  | "done";

export interface RunOutcome {
  state: "done" | "aborted";
  /** State the run was in when it finished or aborted. */
  stage: RunStage;
  message: string;
  candidates: Candidate[];
  rejects: RejectionTally;
  notification: NotifyResult | null;
}

/** Everything a run needs, built once at startup and passed down. */
export interface RunContext {
  config: NotifierConfig;
  gateway: MarketDataGateway;
  channel: NotificationChannel | null;
  now: () => Date;
  sleep?: (ms: number) => Promise<void>;
  /** Per-invocation override of the close-time window (epoch seconds). */
  maxCloseTs?: number;
}

function aborted(stage: RunStage, message: string, partial: Partial<RunOutcome> = {}): RunOutcome {
  log.info(message);
  return {
    state: "aborted",
    stage,
    message,
    candidates: [],
    rejects: emptyTally(),
    notification: null,
    ...partial,
  };
}

/**
 * One pass: events → markets → odds → filter/rank → notify. Empty
 * intermediate results end the run as "aborted", which is still a clean
 * exit. Gateway errors while listing events propagate to the caller.
 */
export async function runOnce(ctx: RunContext): Promise<RunOutcome> {
  const { config } = ctx;
  let stage: RunStage = "init";
  const advance = (next: RunStage) => {
    log.debug("Stage", { from: stage, to: next });
    stage = next;
  };

  // 1. Events
  const fetchLimit = config.maxEventsToAnalyze * DEFAULTS.eventOverFetchFactor;
  log.info("Step 1: Fetching top events", { limit: fetchLimit });
  const events = await ctx.gateway.listEvents(fetchLimit);
  log.info(`Retrieved ${events.length} events`);
  advance("events-fetched");
  if (events.length === 0) return aborted(stage, "No events returned. Exiting.");

  // 2. Markets
  log.info(`Step 2: Processing markets for ${events.length} events`);
  const normalized = normalizeEvents(events, config.maxMarketsPerEvent);
  advance("markets-normalized");
  if (normalized.size === 0) return aborted(stage, "No markets to process. Exiting.");

  const eventMarkets = selectTopEvents(normalized, config.maxEventsToAnalyze);
  log.info(`Prepared ${countMarkets(eventMarkets)} markets across ${eventMarkets.size} events`);

  // 3. Odds
  log.info("Step 3: Fetching current market odds");
  const oddsByTicker = await fetchOdds(ctx.gateway, eventMarkets, {
    batchSize: config.oddsBatchSize,
    pauseMs: config.oddsBatchPauseMs,
    sleep: ctx.sleep,
  });
  advance("odds-fetched");
  if (oddsByTicker.size === 0) return aborted(stage, "Unable to load market odds. Exiting.");

  // 4. Filter + rank
  const result = filterCandidates(eventMarkets, oddsByTicker, {
    now: ctx.now(),
    maxCloseTs: ctx.maxCloseTs,
    minYesPriceCents: config.minYesPriceCents,
    minSpreadCents: config.minSpreadCents,
    minVolume24h: config.minVolume24h,
    maxHoursToClose: config.maxHoursToClose,
  });
  log.info(formatFilterSummary(result));

  const ranked = rankCandidates(result.candidates);
  printCandidateTable(ranked);
  advance("filtered");
  if (ranked.length === 0) {
    return aborted(stage, "No markets met the high-probability criteria. Exiting.", {
      rejects: result.rejects,
    });
  }

  // 5. Notify
  const notification = await notifyCandidates(ranked, ctx.channel, {
    chatId: config.telegram?.chatId ?? null,
    maxNotifications: config.maxNotificationsPerRun,
    now: ctx.now(),
  });
  if (notification.status === "sent") {
    log.info("Notifications", { sent: notification.sent, failed: notification.failed, duplicates: notification.duplicates });
  }
  advance("notified");

  advance("done");
  const message = "Run complete.";
  log.info(message);
  return {
    state: "done",
    stage,
    message,
    candidates: ranked,
    rejects: result.rejects,
    notification,
  };
}
