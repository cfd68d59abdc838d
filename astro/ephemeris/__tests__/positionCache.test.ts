import { beforeEach, describe, expect, it } from "vitest";
import { setAstroLogLevel } from "../../../logging/astroLog.js";
import { createInstant } from "../../instant.js";
import { ApproximateEphemeris } from "../approximateEphemeris.js";
import { PositionCache } from "../positionCache.js";

const set = new ApproximateEphemeris().positions(
  createInstant({ utc: "2000-01-01T00:00:00Z", latitude: 0, longitude: 0 }),
  "tropical"
);

describe("PositionCache", () => {
  beforeEach(() => setAstroLogLevel("silent"));

  it("keys by instant and frame", () => {
    expect(PositionCache.key(0, "tropical")).toBe("0:tropical");
    expect(PositionCache.key(60_000, "sidereal")).toBe("60000:sidereal");
  });

  it("evicts the least recently used entry", () => {
    const cache = new PositionCache(2);
    cache.set("a", set);
    cache.set("b", set);
    cache.get("a");
    cache.set("c", set);

    expect(cache.keys()).toEqual(["a", "c"]);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.size).toBe(2);
  });

  it("refreshes recency on overwrite", () => {
    const cache = new PositionCache(2);
    cache.set("a", set);
    cache.set("b", set);
    cache.set("a", set);
    cache.set("c", set);

    expect(cache.keys()).toEqual(["a", "c"]);
  });

  it("clears", () => {
    const cache = new PositionCache(3);
    cache.set("a", set);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("rejects non-positive capacities", () => {
    expect(() => new PositionCache(0)).toThrow(RangeError);
    expect(() => new PositionCache(1.5)).toThrow(RangeError);
  });
});
