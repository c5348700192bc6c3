export type SignalClass = "STRONG" | "NEUTRAL" | "WEAK" | "UNKNOWN";

// Boundaries on relative strength, in percentage points
export interface Thresholds {
  strong: number;
  weak: number;
}
