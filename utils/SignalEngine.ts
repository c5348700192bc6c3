import type { DashboardSnapshot, SectorEntry } from "../types/DashboardSnapshot";
import type { Quote } from "../types/Quote";
import type { SignalClass, Thresholds } from "../types/Signal";

export default new class SignalEngine {
  /**
   * Sector daily change minus benchmark daily change, in percentage points.
   * Null when either side has no usable change value.
   */
  relativeStrength(quote: Quote | null | undefined, benchmark: Quote | null | undefined): number | null {
    if (!quote || !benchmark) return null;
    if (!Number.isFinite(quote.dailyChangePct) || !Number.isFinite(benchmark.dailyChangePct)) {
      return null;
    }
    return quote.dailyChangePct - benchmark.dailyChangePct;
  }

  computeSignal(
    quote: Quote | null | undefined,
    benchmark: Quote | null | undefined,
    thresholds: Thresholds,
  ): SignalClass {
    const rs = this.relativeStrength(quote, benchmark);
    if (rs === null) return "UNKNOWN";

    if (rs >= thresholds.strong) return "STRONG";
    if (rs <= thresholds.weak) return "WEAK";
    return "NEUTRAL";
  }

  // STRONG sectors, best first. Informational only, nothing is traded on it.
  rankRotationCandidates(snapshot: DashboardSnapshot, maxCandidates: number): SectorEntry[] {
    return snapshot.entries
      .filter((e) => e.signal === "STRONG" && e.relativeStrength !== null)
      .sort((a, b) => (b.relativeStrength ?? 0) - (a.relativeStrength ?? 0))
      .slice(0, Math.max(0, maxCandidates));
  }
}
