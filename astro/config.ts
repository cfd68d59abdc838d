import path from "node:path";
import { z } from "zod";
import { parseInput } from "./validation.js";

export type EphemerisMode = "auto" | "precise" | "approximate";
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface AstroConfig {
  ephemeris_mode: EphemerisMode;
  /** Directory holding the Swiss Ephemeris .se1 files */
  ephe_path: string;
  position_cache_size: number;
  /** Instants are rounded to this many ms before lookup and computation */
  position_cache_rounding_ms: number;
  log_level: LogLevel;
}

const DEFAULT_EPHE_PATH = "ephemeris/ephe";

const AstroEnvSchema = z.object({
  ASTRO_EPHEMERIS_MODE: z.enum(["auto", "precise", "approximate"]).default("auto"),
  ASTRO_EPHE_PATH: z.string().min(1).default(DEFAULT_EPHE_PATH),
  ASTRO_POSITION_CACHE_SIZE: z.coerce.number().int().min(1).default(512),
  ASTRO_POSITION_CACHE_ROUNDING_MS: z.coerce.number().int().min(1).default(60_000),
  ASTRO_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("info"),
});

export const DEFAULT_ASTRO_CONFIG: AstroConfig = Object.freeze({
  ephemeris_mode: "auto",
  ephe_path: path.resolve(DEFAULT_EPHE_PATH),
  position_cache_size: 512,
  position_cache_rounding_ms: 60_000,
  log_level: "info",
});

/**
 * Build the runtime config from environment variables.
 * Empty strings count as unset.
 */
export function loadAstroConfig(
  env: Record<string, string | undefined> = process.env
): AstroConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith("ASTRO_") && value !== undefined && value !== ""
    )
  );
  const parsed = parseInput(AstroEnvSchema, present, "environment");

  return Object.freeze({
    ephemeris_mode: parsed.ASTRO_EPHEMERIS_MODE,
    ephe_path: path.resolve(parsed.ASTRO_EPHE_PATH),
    position_cache_size: parsed.ASTRO_POSITION_CACHE_SIZE,
    position_cache_rounding_ms: parsed.ASTRO_POSITION_CACHE_ROUNDING_MS,
    log_level: parsed.ASTRO_LOG_LEVEL,
  });
}
