import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadAstroConfig } from "../config.js";
import { InvalidInputError } from "../errors.js";

describe("loadAstroConfig", () => {
  it("falls back to defaults when nothing is set", () => {
    const config = loadAstroConfig({});
    expect(config.ephemeris_mode).toBe("auto");
    expect(config.ephe_path).toBe(path.resolve("ephemeris/ephe"));
    expect(config.position_cache_size).toBe(512);
    expect(config.position_cache_rounding_ms).toBe(60_000);
    expect(config.log_level).toBe("info");
  });

  it("reads and coerces ASTRO_ variables", () => {
    const config = loadAstroConfig({
      ASTRO_EPHEMERIS_MODE: "approximate",
      ASTRO_EPHE_PATH: "/opt/ephe",
      ASTRO_POSITION_CACHE_SIZE: "16",
      ASTRO_POSITION_CACHE_ROUNDING_MS: "1000",
      ASTRO_LOG_LEVEL: "silent",
    });
    expect(config).toEqual({
      ephemeris_mode: "approximate",
      ephe_path: "/opt/ephe",
      position_cache_size: 16,
      position_cache_rounding_ms: 1000,
      log_level: "silent",
    });
  });

  it("treats empty strings as unset", () => {
    expect(loadAstroConfig({ ASTRO_EPHEMERIS_MODE: "" }).ephemeris_mode).toBe("auto");
  });

  it("rejects unknown modes", () => {
    expect(() => loadAstroConfig({ ASTRO_EPHEMERIS_MODE: "exact" })).toThrow(InvalidInputError);
  });

  it("rejects a zero cache size", () => {
    expect(() => loadAstroConfig({ ASTRO_POSITION_CACHE_SIZE: "0" })).toThrow(
      /ASTRO_POSITION_CACHE_SIZE/
    );
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadAstroConfig({}))).toBe(true);
  });
});
