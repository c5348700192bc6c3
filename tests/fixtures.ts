import type { Quote } from "../types/Quote";
import type { Sector } from "../types/Sector";
import type { Thresholds } from "../types/Signal";
import type { Config } from "../utils/Config";

export const THRESHOLDS: Thresholds = { strong: 1.0, weak: -1.0 };

export const SECTORS: Sector[] = [
  { name: "Financials", symbol: "XLF", category: "GROWTH" },
  { name: "Utilities", symbol: "XLU", category: "DEFENSIVE" },
  { name: "Energy", symbol: "XLE", category: "GROWTH" },
];

export const makeQuote = (
  symbol: string,
  dailyChangePct: number,
  price = 100,
  timestamp: Date = new Date(),
): Quote => ({ symbol, price, dailyChangePct, timestamp });

export const makeConfig = (overrides: Partial<Config> = {}): Config => ({
  rapidApiKey: "test-key",
  rapidApiHost: "metasyc.p.rapidapi.com",
  mt5Login: 12345,
  mt5Password: "test-password",
  mt5Server: "Demo-Server",
  benchmark: "US500",
  sectors: SECTORS,
  thresholds: THRESHOLDS,
  pollIntervalSeconds: 60,
  maxQuoteAgeSeconds: 900,
  requestTimeoutMs: 15000,
  minRequestIntervalMs: 0,
  maxRotationCandidates: 2,
  ...overrides,
});
