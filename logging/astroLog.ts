/**
 * Structured logging for the computation core.
 *
 * Emits one JSON object per line. Only provider lifecycle and the chart
 * orchestration log; the pure calculators never do.
 */

import type { LogLevel } from "../astro/config.js";

export type AstroLogEvent =
  | "ephemeris.source.loaded"
  | "ephemeris.source.fallback"
  | "ephemeris.source.closed"
  | "ephemeris.cache.evicted"
  | "dasha.assembled"
  | "transit.window.scanned"
  | "chart.computed"
  | "chart.failed";

export type AstroLogData = {
  event: AstroLogEvent;
  accuracy?: "precise" | "approximate";
  ephe_path?: string;
  birth_utc?: string;
  period_count?: number;
  max_level?: number;
  sample_count?: number;
  event_count?: number;
  duration_ms?: number;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const EVENT_LEVEL: Record<AstroLogEvent, Exclude<LogLevel, "silent">> = {
  "ephemeris.source.loaded": "info",
  "ephemeris.source.fallback": "warn",
  "ephemeris.source.closed": "debug",
  "ephemeris.cache.evicted": "debug",
  "dasha.assembled": "debug",
  "transit.window.scanned": "debug",
  "chart.computed": "info",
  "chart.failed": "error",
};

let activeLevel: LogLevel | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK;
}

export function setAstroLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getAstroLogLevel(): LogLevel {
  if (activeLevel) return activeLevel;
  const fromEnv = process.env.ASTRO_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

/**
 * Emit a structured log entry if its level passes the active threshold.
 */
export function astroLog(data: AstroLogData): void {
  const level = EVENT_LEVEL[data.event];
  if (LEVEL_RANK[level] < LEVEL_RANK[getAstroLogLevel()]) return;

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    ...data,
  });

  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function describeError(err: unknown): { error_code: string; error_message: string } {
  if (err instanceof Error) {
    return { error_code: err.name, error_message: err.message };
  }
  return { error_code: "unknown", error_message: String(err) };
}

export const astroLogHelpers = {
  sourceLoaded(params: { accuracy: "precise" | "approximate"; ephe_path?: string }): void {
    astroLog({
      event: "ephemeris.source.loaded",
      accuracy: params.accuracy,
      ephe_path: params.ephe_path,
    });
  },

  sourceFallback(params: { ephe_path: string; reason: unknown }): void {
    astroLog({
      event: "ephemeris.source.fallback",
      accuracy: "approximate",
      ephe_path: params.ephe_path,
      ...describeError(params.reason),
    });
  },

  sourceClosed(params: { accuracy: "precise" | "approximate" }): void {
    astroLog({ event: "ephemeris.source.closed", accuracy: params.accuracy });
  },

  cacheEvicted(params: { key: string; size: number }): void {
    astroLog({ event: "ephemeris.cache.evicted", key: params.key, size: params.size });
  },

  dashaAssembled(params: { birth_utc: string; period_count: number; max_level: number }): void {
    astroLog({
      event: "dasha.assembled",
      birth_utc: params.birth_utc,
      period_count: params.period_count,
      max_level: params.max_level,
    });
  },

  transitWindowScanned(params: {
    start: string;
    end: string;
    sample_count: number;
    event_count: number;
  }): void {
    astroLog({
      event: "transit.window.scanned",
      start: params.start,
      end: params.end,
      sample_count: params.sample_count,
      event_count: params.event_count,
    });
  },

  chartComputed(params: {
    birth_utc: string;
    accuracy: "precise" | "approximate";
    period_count: number;
    duration_ms: number;
  }): void {
    astroLog({
      event: "chart.computed",
      birth_utc: params.birth_utc,
      accuracy: params.accuracy,
      period_count: params.period_count,
      duration_ms: params.duration_ms,
    });
  },

  chartFailed(params: { birth_utc?: string; error: unknown }): void {
    astroLog({
      event: "chart.failed",
      birth_utc: params.birth_utc,
      ...describeError(params.error),
    });
  },
};
