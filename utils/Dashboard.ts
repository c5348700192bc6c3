import type { DashboardSnapshot, EntryStatus, SectorEntry } from "../types/DashboardSnapshot";
import type { Quote } from "../types/Quote";
import type { Sector } from "../types/Sector";
import type { Thresholds } from "../types/Signal";
import SignalEngine from "./SignalEngine";
import Time from "./Time";

export interface DashboardOptions {
  sectors: readonly Sector[];
  benchmarkSymbol: string;
  thresholds: Thresholds;
  maxQuoteAgeSeconds: number;
}

/**
 * Owns the published snapshot. Each update builds a complete, frozen snapshot
 * and only then replaces the held reference, so readers never see a cycle
 * half applied.
 */
export class DashboardState {
  private options: DashboardOptions;
  private snapshot: DashboardSnapshot | null = null;
  private cycle = 0;

  constructor(options: DashboardOptions) {
    this.options = options;
  }

  current(): DashboardSnapshot | null {
    return this.snapshot;
  }

  update(
    cycleQuotes: ReadonlyMap<string, Quote>,
    benchmark: Quote | null,
    now: Date = new Date(),
  ): DashboardSnapshot {
    const benchmarkStatus = this.statusOf(benchmark, now);
    const usableBenchmark = benchmarkStatus === "OK" ? benchmark : null;

    const entries = this.options.sectors.map((sector) =>
      this.buildEntry(sector, cycleQuotes.get(sector.symbol) ?? null, usableBenchmark, now),
    );

    const next: DashboardSnapshot = {
      cycle: this.cycle + 1,
      timestamp: now,
      benchmarkSymbol: this.options.benchmarkSymbol,
      benchmark,
      benchmarkStatus,
      computeSkipped: usableBenchmark === null,
      entries: Object.freeze(entries),
    };
    Object.freeze(next);

    this.cycle = next.cycle;
    this.snapshot = next;
    return next;
  }

  private buildEntry(sector: Sector, quote: Quote | null, benchmark: Quote | null, now: Date): SectorEntry {
    const status = this.statusOf(quote, now);

    let entry: SectorEntry;

    if (status !== "OK") {
      entry = {
        sector,
        quote,
        relativeStrength: null,
        signal: "UNKNOWN",
        status,
        reason: status === "MISSING" ? "no data this cycle" : "quote older than max age",
      };
    } else {
      entry = {
        sector,
        quote,
        relativeStrength: SignalEngine.relativeStrength(quote, benchmark),
        signal: SignalEngine.computeSignal(quote, benchmark, this.options.thresholds),
        status,
      };
      if (!benchmark) entry.reason = "benchmark unavailable";
    }

    return Object.freeze(entry);
  }

  // Outside the regular session the last tick stays valid until the next open
  private statusOf(quote: Quote | null, now: Date): EntryStatus {
    if (!quote) return "MISSING";
    if (!Time.isMarketOpen(now)) return "OK";
    if (Time.ageSeconds(quote.timestamp, now) > this.options.maxQuoteAgeSeconds) return "STALE";
    return "OK";
  }
}
