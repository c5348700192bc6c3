import type { DashboardSnapshot } from "../types/DashboardSnapshot";
import type { Quote } from "../types/Quote";
import type { Config } from "./Config";
import { DashboardState } from "./Dashboard";
import { DataUnavailableError } from "./Errors";
import type { QuoteSource } from "./MetaSync";
import { renderDashboard } from "./Render";

export type Printer = (lines: string[]) => void;

const consolePrinter: Printer = (lines) => console.log(lines.join("\n"));

/**
 * Polling loop. A cycle fetches the benchmark and every sector one after the
 * other, publishes one snapshot and prints it. The next cycle is scheduled
 * only after the previous one has finished, so cycles never overlap.
 */
export class SectorRotationMonitor {
  private config: Config;
  private source: QuoteSource;
  private print: Printer;
  private dashboard: DashboardState;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private stopping = false;

  constructor(config: Config, source: QuoteSource, print: Printer = consolePrinter) {
    this.config = config;
    this.source = source;
    this.print = print;
    this.dashboard = new DashboardState({
      sectors: config.sectors,
      benchmarkSymbol: config.benchmark,
      thresholds: config.thresholds,
      maxQuoteAgeSeconds: config.maxQuoteAgeSeconds,
    });
  }

  current(): DashboardSnapshot | null {
    return this.dashboard.current();
  }

  isRunning(): boolean {
    return this.running;
  }

  async initialize(): Promise<void> {
    console.log("========================================");
    console.log("🚀 Starting Sector Rotation Monitor");
    console.log("========================================\n");
    console.log(`📊 Tracking ${this.config.sectors.length} sectors against ${this.config.benchmark}`);
    console.log(
      `   Thresholds: strong >= ${this.config.thresholds.strong}%, weak <= ${this.config.thresholds.weak}%`,
    );
    console.log(`   Poll interval: ${this.config.pollIntervalSeconds}s\n`);

    await this.source.connect();
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopping = false;
    console.log("✅ Monitor started. Press Ctrl+C to stop.\n");
    this.tick();
  }

  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.running = false;
    console.log("🛑 Monitor stopped");
  }

  async runCycle(): Promise<DashboardSnapshot | null> {
    const benchmark = await this.fetchOrNull(this.config.benchmark);

    const quotes = new Map<string, Quote>();
    for (const sector of this.config.sectors) {
      const quote = await this.fetchOrNull(sector.symbol);
      if (quote) quotes.set(sector.symbol, quote);
    }

    if (this.stopping) {
      console.log("⚠️  Stop requested, discarding unfinished cycle");
      return null;
    }

    const snapshot = this.dashboard.update(quotes, benchmark, new Date());
    this.print(
      renderDashboard(snapshot, {
        thresholds: this.config.thresholds,
        maxRotationCandidates: this.config.maxRotationCandidates,
      }),
    );
    return snapshot;
  }

  private tick(): void {
    this.timer = null;
    this.inFlight = this.runCycle()
      .then(() => undefined)
      .catch((error: unknown) => {
        console.error("❌ Poll cycle failed:", error);
      })
      .finally(() => {
        this.inFlight = null;
        if (this.stopping) return;
        console.log(`\n🔄 Next update in ${this.config.pollIntervalSeconds} seconds...`);
        this.timer = setTimeout(() => this.tick(), this.config.pollIntervalSeconds * 1000);
      });
  }

  private async fetchOrNull(symbol: string): Promise<Quote | null> {
    try {
      return await this.source.fetchQuote(symbol);
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        console.warn(`⚠️  No data for ${error.message}`);
      } else {
        console.error(`❌ Unexpected error fetching ${symbol}:`, error);
      }
      return null;
    }
  }
}
