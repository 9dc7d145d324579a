import "dotenv/config";
import fs from "fs";

// ─── Env vars ───

export const LOG_LEVEL = clean(process.env.LOG_LEVEL ?? "") || "info";

// ─── Kalshi API ───

export const KALSHI_DEMO_BASE_URL = "https://demo-api.kalshi.co";
export const KALSHI_PROD_BASE_URL = "https://api.elections.kalshi.com";
export const KALSHI_API_PREFIX = "/trade-api/v2";
export const KALSHI_WEB_URL = "https://kalshi.com/markets";

// ─── Telegram ───

export const TELEGRAM_API = "https://api.telegram.org";

// ─── Defaults ───

export const DEFAULTS = {
  maxEventsToAnalyze: 600,
  maxMarketsPerEvent: 10,
  eventOverFetchFactor: 3,     // fetch 3x events, keep the top N by 24h volume

  maxHoursToClose: 24,
  minYesPriceCents: 97,
  minSpreadCents: 1,
  minVolume24h: 1000,

  maxNotificationsPerRun: 5,

  oddsBatchSize: 20,
  oddsBatchPauseMs: 200,
  httpTimeoutMs: 10_000,
} as const;

// ─── Types ───

export interface KalshiCredentials {
  apiKey: string;
  privateKeyPem: string;
  useDemo: boolean;
  baseUrl: string;
}

export interface TelegramSettings {
  botToken: string;
  chatId: string;
}

export interface NotifierConfig {
  kalshi: KalshiCredentials;
  telegram: TelegramSettings | null;

  maxEventsToAnalyze: number;
  maxMarketsPerEvent: number;

  maxHoursToClose: number;
  minYesPriceCents: number;
  minSpreadCents: number;
  minVolume24h: number;

  maxNotificationsPerRun: number;

  oddsBatchSize: number;
  oddsBatchPauseMs: number;
  httpTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

// Drops inline "# comments" that some .env editors leave behind.
function clean(value: string): string {
  return value.split("#")[0].trim();
}

function readString(env: Env, key: string): string {
  return clean(env[key] ?? "");
}

function readNumber(env: Env, key: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number {
  const raw = readString(env, key);
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigError(key, `expected a number, got "${raw}"`);
  if (opts.integer && !Number.isInteger(value)) throw new ConfigError(key, `expected an integer, got "${raw}"`);
  if (opts.min !== undefined && value < opts.min) throw new ConfigError(key, `must be >= ${opts.min}, got ${value}`);
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key).toLowerCase();
  if (!raw) return fallback;
  return raw === "true" || raw === "1";
}

// ─── Private key ───

/**
 * Accepts inline PEM text (literal "\n" escapes are expanded) or a path to a
 * .pem file. `KALSHI_PRIVATE_KEY` wins over `KALSHI_PRIVATE_KEY_FILE`.
 */
export function resolvePrivateKey(env: Env): string {
  const inline = (env.KALSHI_PRIVATE_KEY ?? "").trim();
  const file = readString(env, "KALSHI_PRIVATE_KEY_FILE");
  const source = inline || file;
  const key = inline ? "KALSHI_PRIVATE_KEY" : "KALSHI_PRIVATE_KEY_FILE";

  if (!source || source === "your_kalshi_private_key_here") {
    throw new ConfigError("KALSHI_PRIVATE_KEY", "required (PEM text or KALSHI_PRIVATE_KEY_FILE path)");
  }

  let pem = source;
  if (!source.startsWith("-----BEGIN") && (source.endsWith(".pem") || fs.existsSync(source))) {
    try {
      pem = fs.readFileSync(source, "utf-8");
    } catch (e) {
      throw new ConfigError(key, `could not read private key file "${source}": ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  pem = pem.replace(/\\n/g, "\n").trim();
  if (!pem.startsWith("-----BEGIN") || !pem.endsWith("-----")) {
    throw new ConfigError(key, "private key must be PEM, starting with '-----BEGIN' and ending with '-----'");
  }
  return pem;
}

// ─── Loader ───

export function loadConfig(env: Env = process.env): NotifierConfig {
  const apiKey = readString(env, "KALSHI_API_KEY");
  if (!apiKey) throw new ConfigError("KALSHI_API_KEY", "required");

  const useDemo = readBoolean(env, "KALSHI_USE_DEMO", true);
  const botToken = readString(env, "TELEGRAM_BOT_TOKEN");
  const chatId = readString(env, "TELEGRAM_CHAT_ID");

  return {
    kalshi: {
      apiKey,
      privateKeyPem: resolvePrivateKey(env),
      useDemo,
      baseUrl: useDemo ? KALSHI_DEMO_BASE_URL : KALSHI_PROD_BASE_URL,
    },
    telegram: botToken && chatId ? { botToken, chatId } : null,

    maxEventsToAnalyze: readNumber(env, "MAX_EVENTS_TO_ANALYZE", DEFAULTS.maxEventsToAnalyze, { integer: true, min: 1 }),
    maxMarketsPerEvent: readNumber(env, "MAX_MARKETS_PER_EVENT", DEFAULTS.maxMarketsPerEvent, { integer: true, min: 1 }),

    maxHoursToClose: readNumber(env, "MAX_HOURS_TO_CLOSE", DEFAULTS.maxHoursToClose, { min: 0 }),
    minYesPriceCents: readNumber(env, "MIN_YES_PRICE_CENTS", DEFAULTS.minYesPriceCents, { integer: true, min: 1 }),
    minSpreadCents: readNumber(env, "MIN_SPREAD_CENTS", DEFAULTS.minSpreadCents, { integer: true, min: 0 }),
    minVolume24h: readNumber(env, "MIN_VOLUME_24H", DEFAULTS.minVolume24h, { min: 0 }),

    maxNotificationsPerRun: readNumber(env, "MAX_NOTIFICATIONS_PER_RUN", DEFAULTS.maxNotificationsPerRun, { integer: true, min: 0 }),

    oddsBatchSize: readNumber(env, "ODDS_BATCH_SIZE", DEFAULTS.oddsBatchSize, { integer: true, min: 1 }),
    oddsBatchPauseMs: readNumber(env, "ODDS_BATCH_PAUSE_MS", DEFAULTS.oddsBatchPauseMs, { integer: true, min: 0 }),
    httpTimeoutMs: readNumber(env, "HTTP_TIMEOUT_MS", DEFAULTS.httpTimeoutMs, { integer: true, min: 1 }),
  };
}
