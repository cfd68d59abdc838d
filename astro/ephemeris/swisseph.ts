import { createRequire } from "node:module";
import fs from "node:fs";
import { EphemerisCalculationError, EphemerisUnavailableError } from "../errors.js";
import type { Instant } from "../instant.js";
import { FunctionAyanamsha } from "./ayanamsha.js";
import { assertSupportedInstant, buildPositionSet, type ComputedBodyId } from "./positionSet.js";
import type {
  EphemerisProvider,
  PositionSet,
  RawBodyCoordinates,
  ReferenceFrame,
} from "./types.js";

const REQUIRED_PREFIXES = ["sepl_", "semo_", "seas_"];

/**
 * The subset of the `swisseph` binding this module calls.
 */
export interface SwissEphemerisBinding {
  swe_set_ephe_path(path: string): void;
  swe_calc_ut(julianDay: number, body: number, flags: number): unknown;
  swe_set_sid_mode(mode: number, t0: number, ayanT0: number): void;
  swe_get_ayanamsa_ut(julianDay: number): unknown;
  swe_close(): void;
  SE_SUN: number;
  SE_MOON: number;
  SE_MERCURY: number;
  SE_VENUS: number;
  SE_MARS: number;
  SE_JUPITER: number;
  SE_SATURN: number;
  SE_URANUS: number;
  SE_NEPTUNE: number;
  SE_PLUTO: number;
  SE_MEAN_NODE: number;
  SE_SIDM_LAHIRI: number;
  SEFLG_SWIEPH: number;
  SEFLG_SPEED: number;
  SEFLG_MOSEPH: number;
}

const BINDING_FUNCTIONS = [
  "swe_set_ephe_path",
  "swe_calc_ut",
  "swe_set_sid_mode",
  "swe_get_ayanamsa_ut",
  "swe_close",
] as const;

const BINDING_CONSTANTS = [
  "SE_SUN",
  "SE_MOON",
  "SE_MERCURY",
  "SE_VENUS",
  "SE_MARS",
  "SE_JUPITER",
  "SE_SATURN",
  "SE_URANUS",
  "SE_NEPTUNE",
  "SE_PLUTO",
  "SE_MEAN_NODE",
  "SE_SIDM_LAHIRI",
  "SEFLG_SWIEPH",
  "SEFLG_SPEED",
  "SEFLG_MOSEPH",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isSwissEphemerisBinding(value: unknown): value is SwissEphemerisBinding {
  if (!isRecord(value)) return false;
  return (
    BINDING_FUNCTIONS.every((name) => typeof value[name] === "function") &&
    BINDING_CONSTANTS.every((name) => typeof value[name] === "number")
  );
}

/**
 * Check that the directory holds a usable .se1 data set.
 */
export function ensureEphePath(ephePath: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(ephePath);
  } catch (err) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris data files not found at ${ephePath}. ` +
        "Place .se1 files there or set ASTRO_EPHE_PATH.",
      { cause: err }
    );
  }

  if (!stats.isDirectory()) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris path ${ephePath} is not a directory.`
    );
  }

  const se1Files = fs
    .readdirSync(ephePath)
    .filter((name) => name.toLowerCase().endsWith(".se1"));

  if (!se1Files.length) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris .se1 files are missing in ${ephePath}.`
    );
  }

  const missing = REQUIRED_PREFIXES.filter(
    (prefix) => !se1Files.some((name) => name.toLowerCase().startsWith(prefix))
  );

  if (missing.length) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris .se1 files incomplete in ${ephePath}. Missing prefixes: ${missing.join(
        ", "
      )}. Found: ${se1Files.join(", ")}.`
    );
  }
}

/**
 * Load the native binding. It is an optional dependency, so its absence is
 * an availability problem rather than a crash.
 */
export function loadSwissEphemerisBinding(): SwissEphemerisBinding {
  const require = createRequire(import.meta.url);
  let loaded: unknown;
  try {
    loaded = require("swisseph");
  } catch (err) {
    throw new EphemerisUnavailableError("The swisseph package is not installed.", {
      cause: err,
    });
  }
  if (!isSwissEphemerisBinding(loaded)) {
    throw new EphemerisUnavailableError(
      "The swisseph package does not expose the expected functions."
    );
  }
  return loaded;
}

function readNumber(result: Record<string, unknown>, key: string): number | undefined {
  const value = result[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function bodyNumbers(swe: SwissEphemerisBinding): Record<ComputedBodyId, number> {
  return {
    sun: swe.SE_SUN,
    moon: swe.SE_MOON,
    mercury: swe.SE_MERCURY,
    venus: swe.SE_VENUS,
    mars: swe.SE_MARS,
    jupiter: swe.SE_JUPITER,
    saturn: swe.SE_SATURN,
    uranus: swe.SE_URANUS,
    neptune: swe.SE_NEPTUNE,
    pluto: swe.SE_PLUTO,
    rahu: swe.SE_MEAN_NODE,
  };
}

/**
 * Precise strategy backed by the Swiss Ephemeris data files.
 */
export class SwissEphemeris implements EphemerisProvider {
  readonly accuracy = "precise" as const;
  private closed = false;
  private readonly bodies: Record<ComputedBodyId, number>;
  private readonly corrector: FunctionAyanamsha;

  private constructor(
    private readonly swe: SwissEphemerisBinding,
    readonly ephePath: string
  ) {
    this.bodies = bodyNumbers(swe);
    this.corrector = new FunctionAyanamsha("lahiri", (jd) => this.bindingAyanamsha(jd));
  }

  /**
   * Validate the data directory, load the binding and switch it to Lahiri.
   * Throws EphemerisUnavailableError when anything is missing.
   */
  static open(
    ephePath: string,
    loadBinding: () => SwissEphemerisBinding = loadSwissEphemerisBinding
  ): SwissEphemeris {
    ensureEphePath(ephePath);
    const swe = loadBinding();
    swe.swe_set_ephe_path(ephePath);
    swe.swe_set_sid_mode(swe.SE_SIDM_LAHIRI, 0, 0);
    return new SwissEphemeris(swe, ephePath);
  }

  positions(instant: Instant, frame: ReferenceFrame): PositionSet {
    assertSupportedInstant(instant);
    this.assertOpen();
    const jd = instant.julian_day;
    const calc = (body: ComputedBodyId) => this.calcBody(jd, body);

    return buildPositionSet({
      epoch_ms: instant.epoch_ms,
      julian_day: jd,
      frame,
      accuracy: this.accuracy,
      corrector: this.corrector,
      raw: {
        sun: calc("sun"),
        moon: calc("moon"),
        mercury: calc("mercury"),
        venus: calc("venus"),
        mars: calc("mars"),
        jupiter: calc("jupiter"),
        saturn: calc("saturn"),
        uranus: calc("uranus"),
        neptune: calc("neptune"),
        pluto: calc("pluto"),
        rahu: calc("rahu"),
      },
    });
  }

  ayanamsha(instant: Instant): number {
    assertSupportedInstant(instant);
    this.assertOpen();
    return this.bindingAyanamsha(instant.julian_day);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.swe.swe_close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new EphemerisUnavailableError("Swiss Ephemeris source has been closed.");
    }
  }

  private bindingAyanamsha(julianDay: number): number {
    const result = this.swe.swe_get_ayanamsa_ut(julianDay);
    if (typeof result === "number" && Number.isFinite(result)) return result;
    if (isRecord(result)) {
      const value = readNumber(result, "ayanamsa");
      if (value !== undefined) return value;
    }
    throw new EphemerisCalculationError("ayanamsha", "binding returned no value");
  }

  private calcBody(julianDay: number, body: ComputedBodyId): RawBodyCoordinates {
    const swe = this.swe;
    const result = swe.swe_calc_ut(julianDay, this.bodies[body], swe.SEFLG_SWIEPH | swe.SEFLG_SPEED);

    if (!isRecord(result)) {
      throw new EphemerisCalculationError(body, "Swiss Ephemeris returned no result");
    }

    if (typeof result.error === "string" && result.error.length > 0) {
      throw new EphemerisCalculationError(body, result.error);
    }

    const flags = readNumber(result, "rflag") ?? readNumber(result, "rc") ?? readNumber(result, "flag");
    if (flags !== undefined && flags < 0) {
      const serr = typeof result.serr === "string" ? result.serr : "";
      throw new EphemerisCalculationError(body, serr || "Swiss Ephemeris calculation failed");
    }
    if (flags !== undefined && flags & swe.SEFLG_MOSEPH) {
      throw new EphemerisCalculationError(body, "fell back to Moshier (SEFLG_MOSEPH) unexpectedly");
    }

    let longitude = readNumber(result, "longitude");
    let latitude = readNumber(result, "latitude");
    let speed = readNumber(result, "longitudeSpeed");

    if (Array.isArray(result.xx)) {
      const [lo, la, , sp]: unknown[] = result.xx;
      longitude = typeof lo === "number" ? lo : undefined;
      latitude = typeof la === "number" ? la : undefined;
      speed = typeof sp === "number" ? sp : undefined;
    }

    if (longitude === undefined || latitude === undefined || speed === undefined) {
      const keys = Object.keys(result).join(", ") || "none";
      throw new EphemerisCalculationError(body, `invalid data (keys: ${keys})`);
    }

    return { longitude, latitude, speed_deg_per_day: speed };
  }
}
