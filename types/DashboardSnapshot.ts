import type { Quote } from "./Quote";
import type { Sector } from "./Sector";
import type { SignalClass } from "./Signal";

export type EntryStatus = "OK" | "MISSING" | "STALE";

export interface SectorEntry {
  sector: Sector;
  quote: Quote | null;
  relativeStrength: number | null;
  signal: SignalClass;
  status: EntryStatus;
  reason?: string;
}

export interface DashboardSnapshot {
  cycle: number;
  timestamp: Date;
  benchmarkSymbol: string;
  benchmark: Quote | null;
  benchmarkStatus: EntryStatus;
  //true when the benchmark was unusable, so every signal is UNKNOWN
  computeSkipped: boolean;
  entries: readonly SectorEntry[];
}
