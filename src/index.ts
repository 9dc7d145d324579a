#!/usr/bin/env node
import "dotenv/config";
import { createLogger } from "./logger";
import { ConfigError, loadConfig, NotifierConfig } from "./config";
import { KalshiClient } from "./kalshi/api";
import { TelegramChannel } from "./telegram";
import { sleep } from "./batch";
import { RunContext, runOnce } from "./run";
import { toEpochSeconds } from "./time";

const log = createLogger("main");

const USAGE = `Usage: kalshi-notifier [--max-expiration-hours N]

Surfaces near-certain YES markets on Kalshi and sends the best ones to Telegram.
Dry-run only: no orders are ever placed.

Options:
  --max-expiration-hours N   Only consider markets closing within N hours (overrides MAX_HOURS_TO_CLOSE)
  -h, --help                 Show this message`;

export interface CliArgs {
  help: boolean;
  maxExpirationHours: number | null;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, maxExpirationHours: null };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      args.help = true;
      continue;
    }

    let raw: string | undefined;
    if (arg === "--max-expiration-hours") {
      raw = argv[++i];
    } else if (arg.startsWith("--max-expiration-hours=")) {
      raw = arg.slice("--max-expiration-hours=".length);
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    if (raw === undefined || !/^-?\d+$/.test(raw)) {
      throw new UsageError(`--max-expiration-hours expects an integer, got ${raw === undefined ? "nothing" : `"${raw}"`}`);
    }
    args.maxExpirationHours = Number(raw);
  }

  return args;
}

/** The CLI window is clamped to at least one hour. */
export function overrideMaxCloseTs(maxExpirationHours: number | null, now: Date): number | undefined {
  if (maxExpirationHours === null) return undefined;
  return toEpochSeconds(now) + Math.max(1, maxExpirationHours) * 3600;
}

function logSettings(config: NotifierConfig): void {
  log.info(`Environment: ${config.kalshi.useDemo ? "DEMO" : "PRODUCTION"}`);
  log.info(`Max events: ${config.maxEventsToAnalyze} | Max markets per event: ${config.maxMarketsPerEvent}`);
  log.info(
    `Filters → YES ≥ ${config.minYesPriceCents}¢, spread ≥ ${config.minSpreadCents}¢, ` +
      `volume ≥ ${config.minVolume24h}, closes ≤ ${config.maxHoursToClose}h`
  );
  log.info(
    config.telegram
      ? "Telegram notifications: Enabled"
      : "Telegram notifications: Disabled (set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID to enable)"
  );
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  log.info("Initializing high-probability notifier");
  logSettings(config);

  const gateway = new KalshiClient(config.kalshi, { timeoutMs: config.httpTimeoutMs });
  await gateway.login();
  log.info("Kalshi API connected");

  const ctx: RunContext = {
    config,
    gateway,
    channel: config.telegram ? new TelegramChannel(config.telegram.botToken, { timeoutMs: config.httpTimeoutMs }) : null,
    now: () => new Date(),
    sleep,
    maxCloseTs: overrideMaxCloseTs(args.maxExpirationHours, new Date()),
  };

  const outcome = await runOnce(ctx);
  log.info(`Finished (${outcome.state})`, { stage: outcome.stage, candidates: outcome.candidates.length });
}

if (require.main === module) {
  main().catch((err) => {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
    } else if (err instanceof ConfigError) {
      log.error(`Configuration error: ${err.message}`);
      log.error("Please verify your .env configuration.");
    } else {
      log.error("Run failed", err);
    }
    process.exit(1);
  });
}
