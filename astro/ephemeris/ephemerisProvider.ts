import { astroLogHelpers } from "../../logging/astroLog.js";
import type { AstroConfig } from "../config.js";
import { EphemerisUnavailableError } from "../errors.js";
import { shiftInstant, type Instant } from "../instant.js";
import { ApproximateEphemeris } from "./approximateEphemeris.js";
import { PositionCache } from "./positionCache.js";
import { assertSupportedInstant } from "./positionSet.js";
import { SwissEphemeris } from "./swisseph.js";
import type { EphemerisProvider, PositionSet, ReferenceFrame } from "./types.js";

export function roundEpochMs(epochMs: number, roundingMs: number): number {
  return Math.round(epochMs / roundingMs) * roundingMs;
}

/**
 * Memoizes position sets by (rounded instant, frame). Positions are always
 * computed at the rounded instant, so a hit and a miss return the same data.
 */
export class CachedEphemeris implements EphemerisProvider {
  readonly accuracy: EphemerisProvider["accuracy"];
  private readonly cache: PositionCache;
  private readonly roundingMs: number;

  constructor(
    private readonly inner: EphemerisProvider,
    options: { capacity: number; rounding_ms: number }
  ) {
    if (!Number.isInteger(options.rounding_ms) || options.rounding_ms < 1) {
      throw new RangeError(`Cache rounding must be a positive integer, got ${options.rounding_ms}`);
    }
    this.accuracy = inner.accuracy;
    this.cache = new PositionCache(options.capacity);
    this.roundingMs = options.rounding_ms;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  positions(instant: Instant, frame: ReferenceFrame): PositionSet {
    assertSupportedInstant(instant);
    const rounded = roundEpochMs(instant.epoch_ms, this.roundingMs);
    const key = PositionCache.key(rounded, frame);

    const hit = this.cache.get(key);
    if (hit) return hit;

    const computed = this.inner.positions(
      rounded === instant.epoch_ms ? instant : shiftInstant(instant, rounded),
      frame
    );
    this.cache.set(key, computed);
    return computed;
  }

  ayanamsha(instant: Instant): number {
    return this.inner.ayanamsha(instant);
  }

  close(): void {
    this.cache.clear();
    this.inner.close();
  }
}

function openPreciseSource(config: AstroConfig): EphemerisProvider | null {
  if (config.ephemeris_mode === "approximate") return null;
  try {
    const precise = SwissEphemeris.open(config.ephe_path);
    astroLogHelpers.sourceLoaded({ accuracy: "precise", ephe_path: config.ephe_path });
    return precise;
  } catch (err) {
    if (config.ephemeris_mode === "precise" || !(err instanceof EphemerisUnavailableError)) {
      throw err;
    }
    astroLogHelpers.sourceFallback({ ephe_path: config.ephe_path, reason: err });
    return null;
  }
}

/**
 * Select the strategy once, at startup, and wrap it in the position cache.
 */
export function createEphemerisProvider(config: AstroConfig): CachedEphemeris {
  const source = openPreciseSource(config) ?? new ApproximateEphemeris();
  if (source.accuracy === "approximate") {
    astroLogHelpers.sourceLoaded({ accuracy: "approximate" });
  }
  return new CachedEphemeris(source, {
    capacity: config.position_cache_size,
    rounding_ms: config.position_cache_rounding_ms,
  });
}

/**
 * Run `fn` with a provider and release it afterwards, including on failure.
 */
export async function withEphemeris<T>(
  config: AstroConfig,
  fn: (provider: EphemerisProvider) => T | Promise<T>
): Promise<T> {
  const provider = createEphemerisProvider(config);
  try {
    return await fn(provider);
  } finally {
    provider.close();
    astroLogHelpers.sourceClosed({ accuracy: provider.accuracy });
  }
}
