import type { DashboardSnapshot, SectorEntry } from "../types/DashboardSnapshot";
import type { SignalClass, Thresholds } from "../types/Signal";
import SignalEngine from "./SignalEngine";
import Time from "./Time";

export interface RenderOptions {
  thresholds: Thresholds;
  maxRotationCandidates: number;
}

//benchmark daily move, in percent, that prints the volatility warning
const VOLATILITY_WARNING_PCT = 3;
const WIDTH = 100;
const RULE = "=".repeat(WIDTH);
const THIN_RULE = "-".repeat(WIDTH);

export const SIGNAL_MARKERS: Record<SignalClass, string> = {
  STRONG: "🟢 STRONG",
  NEUTRAL: "🟡 NEUTRAL",
  WEAK: "🔴 WEAK",
  UNKNOWN: "⚪ UNKNOWN",
};

export const signed = (value: number): string => `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;

const row = (cells: [string, string, string, string, string, string, string]): string => {
  const [sector, symbol, category, price, daily, rs, signal] = cells;
  return (
    `${sector.padEnd(18)} ${symbol.padEnd(10)} ${category.padEnd(10)} ` +
    `${price.padStart(10)} ${daily.padStart(9)} ${rs.padStart(13)}  ${signal}`
  );
};

// Ranked by relative strength; entries without one keep config order at the bottom
const sortEntries = (entries: readonly SectorEntry[]): SectorEntry[] => {
  const ranked = entries.filter((e) => e.relativeStrength !== null);
  const unranked = entries.filter((e) => e.relativeStrength === null);
  ranked.sort((a, b) => (b.relativeStrength ?? 0) - (a.relativeStrength ?? 0));
  return [...ranked, ...unranked];
};

const benchmarkLine = (snapshot: DashboardSnapshot): string => {
  const { benchmark, benchmarkStatus, benchmarkSymbol } = snapshot;
  if (benchmark && benchmarkStatus === "OK") {
    return `${benchmarkSymbol}: ${benchmark.price.toFixed(2)} (${signed(benchmark.dailyChangePct)}% daily change)`;
  }
  const state = benchmarkStatus === "STALE" ? "stale quote" : "unavailable";
  return `${benchmarkSymbol}: ${state} (signals skipped this cycle)`;
};

const entryLine = (entry: SectorEntry): string => {
  const { sector, quote, relativeStrength, signal, status } = entry;
  const note = status === "OK" ? "" : `  [${status.toLowerCase()}]`;

  return row([
    sector.name,
    sector.symbol,
    sector.category,
    quote ? quote.price.toFixed(2) : "--",
    quote ? `${signed(quote.dailyChangePct)}%` : "--",
    relativeStrength !== null ? `${signed(relativeStrength)}%` : "--",
    `${SIGNAL_MARKERS[signal]}${note}`,
  ]);
};

export const renderDashboard = (snapshot: DashboardSnapshot, options: RenderOptions): string[] => {
  const { thresholds } = options;
  const market = Time.isMarketOpen(snapshot.timestamp) ? "OPEN" : "CLOSED";

  const lines = [
    RULE,
    `SECTOR ROTATION DASHBOARD - ${Time.formatTimestamp(snapshot.timestamp)} | Cycle ${snapshot.cycle} | Market ${market}`,
    THIN_RULE,
    benchmarkLine(snapshot),
  ];

  if (
    snapshot.benchmark &&
    snapshot.benchmarkStatus === "OK" &&
    Math.abs(snapshot.benchmark.dailyChangePct) >= VOLATILITY_WARNING_PCT
  ) {
    lines.push(
      `⚠️  High volatility: ${snapshot.benchmarkSymbol} moved ${signed(snapshot.benchmark.dailyChangePct)}% today`,
    );
  }

  lines.push(RULE);
  lines.push(row(["Sector", "Symbol", "Category", "Price", "Daily %", "Rel Strength", "Signal"]));
  lines.push(THIN_RULE);
  for (const entry of sortEntries(snapshot.entries)) {
    lines.push(entryLine(entry));
  }
  lines.push(RULE);

  const leaders = SignalEngine.rankRotationCandidates(snapshot, options.maxRotationCandidates);
  lines.push(
    `Rotation leaders: ${
      leaders.length > 0
        ? leaders.map((e) => `${e.sector.name} (${e.sector.symbol} ${signed(e.relativeStrength ?? 0)}%)`).join(", ")
        : "none"
    }`,
  );
  lines.push(
    `Legend: ${SIGNAL_MARKERS.STRONG} (RS >= ${signed(thresholds.strong)}%) | ${SIGNAL_MARKERS.NEUTRAL} | ` +
      `${SIGNAL_MARKERS.WEAK} (RS <= ${signed(thresholds.weak)}%) | ${SIGNAL_MARKERS.UNKNOWN} (no usable data)`,
  );

  return lines;
};
