// ─── Kalshi API Response Types ───
// Only the fields this notifier reads. Prices are integer cents (1-99).

export interface KalshiRawMarket {
  ticker?: string;
  event_ticker?: string;
  title?: string;
  subtitle?: string;
  yes_sub_title?: string;
  yes_bid?: number | null;
  yes_ask?: number | null;
  volume?: number;
  volume_24h?: number;
  close_time?: string;
  status?: string;
}

export interface KalshiRawEvent {
  event_ticker?: string;
  series_ticker?: string;
  title?: string;
  sub_title?: string;
  category?: string;
  volume_24h?: number;
  markets?: KalshiRawMarket[];
}

export interface KalshiEventsResponse {
  events?: KalshiRawEvent[];
  cursor?: string;
}

export interface KalshiMarketResponse {
  market?: KalshiRawMarket;
}

export interface KalshiBalanceResponse {
  balance?: number;
}
