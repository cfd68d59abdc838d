import { describe, expect, it } from "vitest";
import {
  angularSeparation,
  normalizeDegrees,
  signDegreeOf,
  signedDifference,
  signOf,
} from "../angles.js";

describe("normalizeDegrees", () => {
  it("folds negatives and full turns into [0, 360)", () => {
    expect(normalizeDegrees(-30)).toBe(330);
    expect(normalizeDegrees(360)).toBe(0);
    expect(normalizeDegrees(725)).toBe(5);
  });

  it("never returns 360 for tiny negative values", () => {
    expect(normalizeDegrees(-1e-15)).toBeLessThan(360);
  });
});

describe("signedDifference", () => {
  it("takes the short way around the circle", () => {
    expect(signedDifference(10, 350)).toBe(20);
    expect(signedDifference(350, 10)).toBe(-20);
  });

  it("maps a half turn to -180", () => {
    expect(signedDifference(180, 0)).toBe(-180);
  });
});

describe("angularSeparation", () => {
  it("is symmetric and at most 180", () => {
    expect(angularSeparation(10, 350)).toBe(20);
    expect(angularSeparation(350, 10)).toBe(20);
    expect(angularSeparation(0, 180)).toBe(180);
    expect(angularSeparation(90, 300)).toBe(150);
  });
});

describe("signs", () => {
  it("maps sign boundaries to the sign that starts there", () => {
    expect(signOf(0)).toBe("aries");
    expect(signOf(29.999)).toBe("aries");
    expect(signOf(30)).toBe("taurus");
    expect(signOf(359.5)).toBe("pisces");
    expect(signOf(-15)).toBe("pisces");
  });

  it("gives degrees within the sign", () => {
    expect(signDegreeOf(45)).toBe(15);
    expect(signDegreeOf(330)).toBe(0);
  });
});
