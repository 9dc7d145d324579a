import { KalshiRawMarket } from "./kalshi/types";

// ─── Market Data ───

export interface KalshiEvent {
  ticker: string;           // e.g. "KXHIGHNY-24DEC31"
  title: string;
  volume24h: number;
  markets: KalshiRawMarket[];
}

export interface MarketSummary {
  ticker: string;           // e.g. "KXHIGHNY-24DEC31-B45"
  title: string;
  subtitle: string;         // outcome label, "" when the market has none
  volume: number;
  volume24h: number;
  closeTime: string;        // raw ISO string from the events payload
}

export interface EventMarkets {
  event: KalshiEvent;
  markets: MarketSummary[];
}

/** Order-book snapshot for one ticker. Prices are integer cents; null when that side of the book is empty. */
export interface Odds {
  yesBid: number | null;
  yesAsk: number | null;
  closeTime: string | null;
  volume: number;
}

// ─── Filtering ───

export interface Candidate {
  ticker: string;
  tickerBase: string;
  eventTicker: string;
  eventSlug: string;
  eventTitle: string;
  marketTitle: string;
  marketSubtitle: string;
  yesBid: number;
  yesAsk: number;
  spread: number;           // cents
  hoursToClose: number | null;
  closeTs: number;          // epoch seconds, UTC
  eventVolume24h: number;
  marketVolume: number;
  roiCents: number;
  roiPct: number;
}

export interface RejectionTally {
  noOdds: number;
  price: number;
  spread: number;
  expiration: number;
  volume: number;
}

export interface FilterResult {
  candidates: Candidate[];
  rejects: RejectionTally;
  totalMarkets: number;     // markets with a ticker
}

// ─── Collaborators ───

export interface MarketDataGateway {
  listEvents(limit: number): Promise<KalshiEvent[]>;
  getOdds(ticker: string): Promise<Odds | null>;
}

export type MessageFormat = "HTML";

export type SendResult = { ok: true } | { ok: false; error: string };

export interface NotificationChannel {
  send(chatId: string, text: string, format: MessageFormat): Promise<SendResult>;
}
