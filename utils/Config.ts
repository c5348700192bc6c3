import { readFileSync } from "fs";
import path from "path";
import type { Sector, SectorCategory } from "../types/Sector";
import type { Thresholds } from "../types/Signal";
import { ConfigError } from "./Errors";
import { isRecord } from "./Json";

export const DEFAULT_API_HOST = "metasyc.p.rapidapi.com";
export const DEFAULT_SECTORS_FILE = "config/sectors.json";

export interface Config {
  rapidApiKey: string;
  rapidApiHost: string;
  mt5Login: number;
  mt5Password: string;
  mt5Server: string;
  benchmark: string;
  sectors: readonly Sector[];
  thresholds: Thresholds;
  pollIntervalSeconds: number;
  maxQuoteAgeSeconds: number;
  requestTimeoutMs: number;
  minRequestIntervalMs: number;
  maxRotationCandidates: number;
}

type Env = Record<string, string | undefined>;

const CATEGORIES: readonly SectorCategory[] = ["GROWTH", "DEFENSIVE"];

const isCategory = (value: unknown): value is SectorCategory =>
  typeof value === "string" && CATEGORIES.some((c) => c === value);

const requireEnv = (env: Env, key: string): string => {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigError(`${key} is required in .env`);
  }
  return value;
};

const numberFrom = (raw: unknown, label: string): number => {
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${label} must be a number, got ${JSON.stringify(raw)}`);
  }
  return value;
};

const positive = (value: number, label: string): number => {
  if (value <= 0) {
    throw new ConfigError(`${label} must be greater than 0`);
  }
  return value;
};

// Env value when set, otherwise the file value, otherwise the fallback
const pick = (envValue: string | undefined, fileValue: unknown, fallback: number, label: string): number => {
  if (envValue !== undefined && envValue.trim() !== "") return numberFrom(envValue, label);
  if (fileValue !== undefined) return numberFrom(fileValue, label);
  return fallback;
};

const readSectorFile = (file: string): Record<string, unknown> => {
  let text: string;
  try {
    text = readFileSync(file, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read sector file ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Sector file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Sector file ${file} must contain a JSON object`);
  }
  return parsed;
};

const parseSectors = (raw: unknown, benchmark: string): Sector[] => {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigError("sectors must be a non-empty list");
  }

  const seen = new Set<string>();
  return raw.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new ConfigError(`sectors[${index}] must be an object`);
    }
    const { name, symbol, category } = item;

    if (typeof name !== "string" || !name.trim()) {
      throw new ConfigError(`sectors[${index}].name is required`);
    }
    if (typeof symbol !== "string" || !symbol.trim()) {
      throw new ConfigError(`sectors[${index}].symbol is required`);
    }
    if (!isCategory(category)) {
      throw new ConfigError(`sectors[${index}].category must be one of ${CATEGORIES.join(", ")}`);
    }
    const trimmed = symbol.trim();
    if (seen.has(trimmed)) {
      throw new ConfigError(`Duplicate sector symbol ${trimmed}`);
    }
    if (trimmed === benchmark) {
      throw new ConfigError(`Benchmark ${benchmark} cannot also be a tracked sector`);
    }
    seen.add(trimmed);

    return Object.freeze({ name: name.trim(), symbol: trimmed, category });
  });
};

export const loadConfig = (env: Env = process.env): Config => {
  const file = path.resolve(env.SECTORS_FILE?.trim() || DEFAULT_SECTORS_FILE);
  const data = readSectorFile(file);

  const benchmark = typeof data.benchmark === "string" ? data.benchmark.trim() : "";
  if (!benchmark) {
    throw new ConfigError("benchmark symbol is required in the sector file");
  }

  const fileThresholds: Record<string, unknown> = isRecord(data.thresholds) ? data.thresholds : {};
  const thresholds: Thresholds = {
    strong: pick(env.STRONG_THRESHOLD, fileThresholds.strong, 1.0, "thresholds.strong"),
    weak: pick(env.WEAK_THRESHOLD, fileThresholds.weak, -1.0, "thresholds.weak"),
  };
  if (thresholds.strong <= thresholds.weak) {
    throw new ConfigError(
      `thresholds.strong (${thresholds.strong}) must be greater than thresholds.weak (${thresholds.weak})`,
    );
  }

  const login = requireEnv(env, "MT5_LOGIN");
  if (!/^\d+$/.test(login)) {
    throw new ConfigError("MT5_LOGIN must be a numeric account id");
  }

  const config: Config = {
    rapidApiKey: requireEnv(env, "RAPIDAPI_KEY"),
    rapidApiHost: env.RAPIDAPI_HOST?.trim() || DEFAULT_API_HOST,
    mt5Login: Number(login),
    mt5Password: requireEnv(env, "MT5_PASSWORD"),
    mt5Server: requireEnv(env, "MT5_SERVER"),
    benchmark,
    sectors: Object.freeze(parseSectors(data.sectors, benchmark)),
    thresholds: Object.freeze(thresholds),
    pollIntervalSeconds: positive(
      pick(env.POLL_INTERVAL_SECONDS, data.pollIntervalSeconds, 300, "pollIntervalSeconds"),
      "pollIntervalSeconds",
    ),
    maxQuoteAgeSeconds: positive(
      pick(env.MAX_QUOTE_AGE_SECONDS, data.maxQuoteAgeSeconds, 900, "maxQuoteAgeSeconds"),
      "maxQuoteAgeSeconds",
    ),
    requestTimeoutMs: positive(pick(env.REQUEST_TIMEOUT_MS, undefined, 15000, "REQUEST_TIMEOUT_MS"), "REQUEST_TIMEOUT_MS"),
    minRequestIntervalMs: pick(env.MIN_REQUEST_INTERVAL_MS, undefined, 1000, "MIN_REQUEST_INTERVAL_MS"),
    maxRotationCandidates: pick(env.MAX_ROTATION_CANDIDATES, undefined, 2, "MAX_ROTATION_CANDIDATES"),
  };

  if (config.minRequestIntervalMs < 0) {
    throw new ConfigError("MIN_REQUEST_INTERVAL_MS cannot be negative");
  }
  if (!Number.isInteger(config.maxRotationCandidates) || config.maxRotationCandidates < 0) {
    throw new ConfigError("MAX_ROTATION_CANDIDATES must be a non-negative integer");
  }

  return Object.freeze(config);
};
