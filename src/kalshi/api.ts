import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { createLogger } from "../logger";
import { DEFAULTS, KALSHI_API_PREFIX, KalshiCredentials } from "../config";
import { KalshiEvent, MarketDataGateway, Odds } from "../types";
import { createSigner, RequestSigner } from "./auth";
import {
  KalshiBalanceResponse,
  KalshiEventsResponse,
  KalshiMarketResponse,
  KalshiRawEvent,
  KalshiRawMarket,
} from "./types";

const log = createLogger("kalshi-api");

const EVENTS_PAGE_LIMIT = 200;

export class KalshiApiError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`Kalshi ${method} ${path}: ${status} ${body.slice(0, 100)}`);
    this.name = "KalshiApiError";
  }
}

export interface KalshiClientOptions {
  timeoutMs?: number;
  /** Replaces axios' HTTP adapter; tests use it to serve canned responses. */
  adapter?: AxiosAdapter;
}

type QueryParams = Record<string, string | number | boolean>;

// ─── Convert raw payloads to our types ───

function numberOr(value: number | null | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function priceOrNull(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function mapEvent(raw: KalshiRawEvent): KalshiEvent {
  return {
    ticker: raw.event_ticker || "",
    title: raw.title || "",
    volume24h: numberOr(raw.volume_24h, 0),
    markets: raw.markets || [],
  };
}

export function mapOdds(raw: KalshiRawMarket): Odds {
  return {
    yesBid: priceOrNull(raw.yes_bid),
    yesAsk: priceOrNull(raw.yes_ask),
    closeTime: raw.close_time || null,
    volume: numberOr(raw.volume, 0),
  };
}

function describeBody(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}

// ─── Client ───

export class KalshiClient implements MarketDataGateway {
  private readonly http: AxiosInstance;
  private readonly signer: RequestSigner;

  constructor(creds: KalshiCredentials, opts: KalshiClientOptions = {}) {
    this.signer = createSigner(creds.apiKey, creds.privateKeyPem);
    this.http = axios.create({
      baseURL: `${creds.baseUrl.replace(/\/$/, "")}${KALSHI_API_PREFIX}`,
      timeout: opts.timeoutMs ?? DEFAULTS.httpTimeoutMs,
      headers: { Accept: "application/json" },
      ...(opts.adapter ? { adapter: opts.adapter } : {}),
    });
  }

  private async get<T>(path: string, params?: QueryParams): Promise<T> {
    const headers = this.signer.headers("GET", `${KALSHI_API_PREFIX}${path}`);
    log.debug("Fetching", { path, params });

    try {
      const { data } = await this.http.get<T>(path, { params, headers });
      return data;
    } catch (e) {
      if (axios.isAxiosError(e) && e.response) {
        const body = describeBody(e.response.data);
        log.debug("Kalshi API error", { status: e.response.status, body: body.slice(0, 200) });
        throw new KalshiApiError("GET", path, e.response.status, body);
      }
      throw e;
    }
  }

  /** Verifies the credentials with a signed portfolio read. Throws on any failure. */
  async login(): Promise<void> {
    const data = await this.get<KalshiBalanceResponse>("/portfolio/balance");
    log.info("Authenticated with Kalshi", { balanceCents: data.balance ?? null });
  }

  // ─── Events with nested markets, following the cursor ───

  async listEvents(limit: number): Promise<KalshiEvent[]> {
    const all: KalshiEvent[] = [];
    if (limit <= 0) return all;
    let cursor = "";

    do {
      const pageLimit = Math.min(limit - all.length, EVENTS_PAGE_LIMIT);
      const params: QueryParams = {
        status: "open",
        with_nested_markets: true,
        limit: pageLimit,
      };
      if (cursor) params.cursor = cursor;

      const data = await this.get<KalshiEventsResponse>("/events", params);
      const events = (data.events || []).map(mapEvent);
      all.push(...events);

      cursor = data.cursor || "";
      // Last page
      if (events.length < pageLimit) break;
    } while (cursor && all.length < limit);

    log.debug("Events fetched", { requested: limit, received: all.length });
    return all.slice(0, limit);
  }

  // ─── Current odds for a single market ───

  async getOdds(ticker: string): Promise<Odds | null> {
    const data = await this.get<KalshiMarketResponse>(`/markets/${encodeURIComponent(ticker)}`);
    if (!data || !data.market) return null;
    return mapOdds(data.market);
  }
}
