import { describe, expect, it } from "vitest";
import { DashboardState } from "../utils/Dashboard";
import type { SignalClass } from "../types/Signal";
import SignalEngine from "../utils/SignalEngine";
import { makeQuote, SECTORS, THRESHOLDS } from "./fixtures";

const SIGNAL_ORDER: Record<Exclude<SignalClass, "UNKNOWN">, number> = {
  WEAK: 0,
  NEUTRAL: 1,
  STRONG: 2,
};

describe("SignalEngine.computeSignal", () => {
  const benchmark = makeQuote("US500", 0.5);

  it("classifies sectors by their change relative to the benchmark", () => {
    const a = makeQuote("A", 2.35);
    const b = makeQuote("B", 0.75);
    const c = makeQuote("C", -0.8);

    expect(SignalEngine.relativeStrength(a, benchmark)).toBeCloseTo(1.85, 10);
    expect(SignalEngine.relativeStrength(b, benchmark)).toBeCloseTo(0.25, 10);
    expect(SignalEngine.relativeStrength(c, benchmark)).toBeCloseTo(-1.3, 10);

    expect(SignalEngine.computeSignal(a, benchmark, THRESHOLDS)).toBe("STRONG");
    expect(SignalEngine.computeSignal(b, benchmark, THRESHOLDS)).toBe("NEUTRAL");
    expect(SignalEngine.computeSignal(c, benchmark, THRESHOLDS)).toBe("WEAK");
  });

  it("treats the threshold values themselves as inside the outer classes", () => {
    expect(SignalEngine.computeSignal(makeQuote("A", 1.5), benchmark, THRESHOLDS)).toBe("STRONG");
    expect(SignalEngine.computeSignal(makeQuote("A", -0.5), benchmark, THRESHOLDS)).toBe("WEAK");
  });

  it("returns UNKNOWN when either quote is missing, whatever the thresholds", () => {
    const quote = makeQuote("A", 5);
    for (const thresholds of [THRESHOLDS, { strong: 0.1, weak: -0.1 }, { strong: 50, weak: -50 }]) {
      expect(SignalEngine.computeSignal(null, benchmark, thresholds)).toBe("UNKNOWN");
      expect(SignalEngine.computeSignal(quote, null, thresholds)).toBe("UNKNOWN");
      expect(SignalEngine.computeSignal(undefined, undefined, thresholds)).toBe("UNKNOWN");
    }
  });

  it("returns UNKNOWN for non-finite change values", () => {
    expect(SignalEngine.computeSignal(makeQuote("A", Number.NaN), benchmark, THRESHOLDS)).toBe("UNKNOWN");
    expect(SignalEngine.computeSignal(makeQuote("A", 1), makeQuote("US500", Infinity), THRESHOLDS)).toBe("UNKNOWN");
    expect(SignalEngine.relativeStrength(makeQuote("A", Number.NaN), benchmark)).toBeNull();
  });

  it("gives the same answer for the same inputs", () => {
    const quote = makeQuote("A", 0.9);
    const first = SignalEngine.computeSignal(quote, benchmark, THRESHOLDS);
    for (let i = 0; i < 5; i++) {
      expect(SignalEngine.computeSignal(quote, benchmark, THRESHOLDS)).toBe(first);
    }
  });

  it("never moves backwards as the sector change increases", () => {
    let previous = -1;
    for (let change = -5; change <= 5; change += 0.25) {
      const signal = SignalEngine.computeSignal(makeQuote("A", change), benchmark, THRESHOLDS);
      expect(signal).not.toBe("UNKNOWN");
      if (signal === "UNKNOWN") continue;
      const rank = SIGNAL_ORDER[signal];
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
    expect(previous).toBe(SIGNAL_ORDER.STRONG);
  });
});

describe("SignalEngine.rankRotationCandidates", () => {
  const now = new Date();
  const state = new DashboardState({
    sectors: SECTORS,
    benchmarkSymbol: "US500",
    thresholds: THRESHOLDS,
    maxQuoteAgeSeconds: 900,
  });
  const snapshot = state.update(
    new Map([
      ["XLF", makeQuote("XLF", 2, 100, now)],
      ["XLU", makeQuote("XLU", 0.2, 100, now)],
      ["XLE", makeQuote("XLE", 3.5, 100, now)],
    ]),
    makeQuote("US500", 0.5, 5000, now),
    now,
  );

  it("lists STRONG sectors best first", () => {
    const leaders = SignalEngine.rankRotationCandidates(snapshot, 2);
    expect(leaders.map((e) => e.sector.symbol)).toEqual(["XLE", "XLF"]);
  });

  it("caps the list", () => {
    expect(SignalEngine.rankRotationCandidates(snapshot, 1).map((e) => e.sector.symbol)).toEqual(["XLE"]);
    expect(SignalEngine.rankRotationCandidates(snapshot, 0)).toEqual([]);
  });
});
