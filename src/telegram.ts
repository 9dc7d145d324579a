/**
 * Telegram Bot API delivery. Never throws: a failed send comes back as
 * `{ ok: false, error }` so one bad message cannot stop the run.
 */
import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { DEFAULTS, TELEGRAM_API } from "./config";
import { MessageFormat, NotificationChannel, SendResult } from "./types";

interface TelegramResponse {
  ok: boolean;
  description?: string;
}

export interface TelegramChannelOptions {
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export class TelegramChannel implements NotificationChannel {
  private readonly http: AxiosInstance;

  constructor(botToken: string, opts: TelegramChannelOptions = {}) {
    this.http = axios.create({
      baseURL: `${TELEGRAM_API}/bot${botToken}`,
      timeout: opts.timeoutMs ?? DEFAULTS.httpTimeoutMs,
      ...(opts.adapter ? { adapter: opts.adapter } : {}),
    });
  }

  async send(chatId: string, text: string, format: MessageFormat): Promise<SendResult> {
    try {
      const { data } = await this.http.post<TelegramResponse>("/sendMessage", {
        chat_id: chatId,
        text,
        parse_mode: format,
        disable_web_page_preview: true,
      });
      if (data && data.ok === false) {
        return { ok: false, error: data.description || "Telegram rejected the message" };
      }
      return { ok: true };
    } catch (err) {
      if (axios.isAxiosError<TelegramResponse>(err)) {
        const description = err.response?.data?.description;
        return { ok: false, error: description ? `${err.response?.status} ${description}` : err.message };
      }
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }
}
