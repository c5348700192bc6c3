import axios, { type AxiosInstance, type Method } from "axios";
import type { MetaSyncCandle, MetaSyncTick } from "../types/MetaSync";
import type { Quote } from "../types/Quote";
import { DataUnavailableError } from "./Errors";
import { finiteNumber, isRecord } from "./Json";
import Time from "./Time";

export interface QuoteSource {
  connect(): Promise<void>;
  fetchQuote(symbol: string): Promise<Quote>;
}

export interface MetaSyncOptions {
  apiKey: string;
  apiHost: string;
  login: number;
  password: string;
  server: string;
  requestTimeoutMs: number;
  minRequestIntervalMs: number;
  //days of D1 history requested; weekends and holidays need some slack
  lookbackDays?: number;
}

const ENDPOINTS = {
  connect: "/connect",
  tick: "/tick",
  ohlc: "/ohlc",
} as const;

export class MetaSyncClient implements QuoteSource {
  private options: MetaSyncOptions;
  private http: AxiosInstance;
  private headers: Record<string, string>;
  private connected = false;
  private lastRequestTime = 0;

  constructor(options: MetaSyncOptions, http?: AxiosInstance) {
    this.options = options;
    this.http =
      http ??
      axios.create({
        baseURL: `https://${options.apiHost}`,
        timeout: options.requestTimeoutMs,
      });
    this.headers = {
      "x-rapidapi-key": options.apiKey,
      "x-rapidapi-host": options.apiHost,
      "Content-Type": "application/json",
    };
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    console.log(`🔹 Connecting to MetaTrader5 data session (Server: ${this.options.server})...`);

    const result = await this.request(this.options.server, "POST", ENDPOINTS.connect, {
      data: {
        login: this.options.login,
        password: this.options.password,
        server: this.options.server,
        path: "",
        timeout: 10000,
      },
    });

    if (!isRecord(result) || result.connected !== true || result.status !== "success") {
      const message = isRecord(result) && typeof result.message === "string" ? result.message : "Unknown error";
      throw new DataUnavailableError(this.options.server, `connect failed: ${message}`);
    }

    this.connected = true;
    console.log(`✅ Connected to MetaTrader5 (Login: ${String(result.login ?? this.options.login)})`);
  }

  async fetchQuote(symbol: string, now: Date = new Date()): Promise<Quote> {
    await this.connect();

    const tick = this.parseTick(symbol, await this.request(symbol, "GET", ENDPOINTS.tick, { params: { symbol } }));
    const price = this.priceFromTick(symbol, tick);

    const candles = await this.getDailyCandles(symbol, now);
    if (candles.length < 2) {
      throw new DataUnavailableError(symbol, `need 2 daily candles, got ${candles.length}`);
    }

    const prevClose = candles[candles.length - 2].close;
    if (prevClose <= 0) {
      throw new DataUnavailableError(symbol, `invalid previous close ${prevClose}`);
    }

    return {
      symbol,
      price,
      dailyChangePct: ((price - prevClose) / prevClose) * 100,
      timestamp: tick.time !== undefined ? new Date(tick.time * 1000) : now,
    };
  }

  async getDailyCandles(symbol: string, now: Date = new Date()): Promise<MetaSyncCandle[]> {
    const lookbackDays = this.options.lookbackDays ?? 4;
    const from = new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000);

    const result = await this.request(symbol, "GET", ENDPOINTS.ohlc, {
      params: {
        symbol,
        timeframe: "D1",
        date_from: Time.formatTimestamp(from),
        date_to: Time.formatTimestamp(now),
      },
    });

    let raw: unknown[];
    if (Array.isArray(result)) {
      raw = result;
    } else if (isRecord(result) && Array.isArray(result.candles)) {
      raw = result.candles;
    } else if (isRecord(result) && typeof result.message === "string") {
      throw new DataUnavailableError(symbol, `API error: ${result.message}`);
    } else {
      throw new DataUnavailableError(symbol, "unexpected OHLC response format");
    }

    return raw
      .map((c) => this.parseCandle(c))
      .filter((c): c is MetaSyncCandle => c !== null)
      .sort((a, b) => a.time - b.time);
  }

  private parseTick(symbol: string, data: unknown): MetaSyncTick {
    if (!isRecord(data)) {
      throw new DataUnavailableError(symbol, "unexpected tick response format");
    }
    return {
      bid: finiteNumber(data.bid),
      ask: finiteNumber(data.ask),
      last: finiteNumber(data.last),
      time: finiteNumber(data.time),
      volume: finiteNumber(data.volume),
    };
  }

  private priceFromTick(symbol: string, tick: MetaSyncTick): number {
    if (tick.bid !== undefined && tick.ask !== undefined && tick.bid > 0 && tick.ask > 0) {
      return (tick.bid + tick.ask) / 2;
    }
    if (tick.last !== undefined && tick.last > 0) {
      return tick.last;
    }
    throw new DataUnavailableError(symbol, "no valid tick data");
  }

  private parseCandle(data: unknown): MetaSyncCandle | null {
    if (!isRecord(data)) return null;
    const time = finiteNumber(data.time);
    const close = finiteNumber(data.close);
    if (time === undefined || close === undefined) return null;

    return {
      time,
      open: finiteNumber(data.open) ?? close,
      high: finiteNumber(data.high) ?? close,
      low: finiteNumber(data.low) ?? close,
      close,
      tick_volume: finiteNumber(data.tick_volume),
    };
  }

  private async rateLimit(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.options.minRequestIntervalMs) {
      await Time.sleep(this.options.minRequestIntervalMs - elapsed);
    }
  }

  // One attempt per call; failures surface as DataUnavailableError and the caller waits for the next cycle
  private async request(
    label: string,
    method: Method,
    url: string,
    extra: { params?: Record<string, string>; data?: Record<string, unknown> },
  ): Promise<unknown> {
    await this.rateLimit();
    const start = Date.now();

    try {
      const response = await this.http.request<unknown>({ method, url, headers: this.headers, ...extra });
      console.log(`  ✅ ${method} ${url} (${label}) in ${Date.now() - start}ms`);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 429) {
          throw new DataUnavailableError(label, "rate limited (429)");
        }
        const detail = status !== undefined ? `HTTP ${status}` : error.code ?? error.message;
        throw new DataUnavailableError(label, `${method} ${url} failed: ${detail}`);
      }
      throw error;
    } finally {
      this.lastRequestTime = Date.now();
    }
  }
}
