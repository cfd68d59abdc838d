/**
 * Closed-form ephemeris from mean orbital elements.
 *
 * Used when the Swiss Ephemeris files are not available. Typical error is a
 * few arcminutes for the planets and well under a degree for the Moon between
 * 1800 and 2200; it degrades smoothly outside that span.
 */

import { normalizeDegrees, signedDifference, toDegrees, toRadians } from "../angles.js";
import type { Instant } from "../instant.js";
import { julianCenturiesFromJ2000, LahiriAyanamsha } from "./ayanamsha.js";
import {
  ELEMENTS_EPOCH_JULIAN_DAY,
  MEAN_ELEMENTS,
  elementAt,
  type OrbitalElements,
  type OrbitingBody,
} from "./meanElements.js";
import {
  assertSupportedInstant,
  buildPositionSet,
  type ComputedBodyId,
} from "./positionSet.js";
import type {
  AyanamshaCorrector,
  EphemerisProvider,
  PositionSet,
  RawBodyCoordinates,
  ReferenceFrame,
} from "./types.js";

type EclipticPoint = { longitude: number; latitude: number };
type Vector3 = { x: number; y: number; z: number };

/** Half-width of the central difference used for speeds, in days */
const SPEED_STEP_DAYS = 0.5;

/** Precession in longitude, degrees per day; moves J2000 coordinates to date */
const PRECESSION_DEG_PER_DAY = 3.82394e-5;

const sin = (deg: number) => Math.sin(toRadians(deg));
const cos = (deg: number) => Math.cos(toRadians(deg));

function solveKepler(meanAnomalyRad: number, e: number): number {
  let E = meanAnomalyRad + e * Math.sin(meanAnomalyRad);
  for (let i = 0; i < 12; i += 1) {
    const f = E - e * Math.sin(E) - meanAnomalyRad;
    const fp = 1 - e * Math.cos(E);
    const step = f / fp;
    E -= step;
    if (Math.abs(step) < 1e-12) break;
  }
  return E;
}

/**
 * Position in the orbital plane rotated onto the ecliptic (heliocentric,
 * or geocentric for the Moon).
 */
function orbitalPosition(elements: OrbitalElements, days: number): Vector3 & { r: number } {
  const N = elementAt(elements.node, days);
  const i = elementAt(elements.inclination, days);
  const w = elementAt(elements.perihelion, days);
  const a = elementAt(elements.semi_major_axis, days);
  const e = elementAt(elements.eccentricity, days);
  const M = normalizeDegrees(elementAt(elements.mean_anomaly, days));

  const E = solveKepler(toRadians(M), e);
  const xv = a * (Math.cos(E) - e);
  const yv = a * Math.sqrt(1 - e * e) * Math.sin(E);
  const v = toDegrees(Math.atan2(yv, xv));
  const r = Math.sqrt(xv * xv + yv * yv);
  const u = v + w;

  return {
    r,
    x: r * (cos(N) * cos(u) - sin(N) * sin(u) * cos(i)),
    y: r * (sin(N) * cos(u) + cos(N) * sin(u) * cos(i)),
    z: r * sin(u) * sin(i),
  };
}

function toEcliptic(v: Vector3): EclipticPoint {
  return {
    longitude: normalizeDegrees(toDegrees(Math.atan2(v.y, v.x))),
    latitude: toDegrees(Math.atan2(v.z, Math.sqrt(v.x * v.x + v.y * v.y))),
  };
}

function fromEcliptic(point: EclipticPoint, r: number): Vector3 {
  return {
    x: r * cos(point.longitude) * cos(point.latitude),
    y: r * sin(point.longitude) * cos(point.latitude),
    z: r * sin(point.latitude),
  };
}

function meanAnomaly(body: OrbitingBody, days: number): number {
  return normalizeDegrees(elementAt(MEAN_ELEMENTS[body].mean_anomaly, days));
}

function sunVector(days: number): { vector: Vector3; longitude: number } {
  const orbit = orbitalPosition(MEAN_ELEMENTS.sun, days);
  const point = toEcliptic(orbit);
  return { vector: { x: orbit.x, y: orbit.y, z: 0 }, longitude: point.longitude };
}

/**
 * Jupiter/Saturn/Uranus mutual perturbations, degrees.
 */
function giantPerturbations(
  body: "jupiter" | "saturn" | "uranus",
  days: number
): EclipticPoint {
  const Mj = meanAnomaly("jupiter", days);
  const Ms = meanAnomaly("saturn", days);
  const Mu = meanAnomaly("uranus", days);

  if (body === "jupiter") {
    return {
      longitude:
        -0.332 * sin(2 * Mj - 5 * Ms - 67.6) -
        0.056 * sin(2 * Mj - 2 * Ms + 21) +
        0.042 * sin(3 * Mj - 5 * Ms + 21) -
        0.036 * sin(Mj - 2 * Ms) +
        0.022 * cos(Mj - Ms) +
        0.023 * sin(2 * Mj - 3 * Ms + 52) -
        0.016 * sin(Mj - 5 * Ms - 69),
      latitude: 0,
    };
  }
  if (body === "saturn") {
    return {
      longitude:
        0.812 * sin(2 * Mj - 5 * Ms - 67.6) -
        0.229 * cos(2 * Mj - 4 * Ms - 2) +
        0.119 * sin(Mj - 2 * Ms - 3) +
        0.046 * sin(2 * Mj - 6 * Ms - 69) +
        0.014 * sin(Mj - 3 * Ms + 32),
      latitude: -0.02 * cos(2 * Mj - 4 * Ms - 2) + 0.018 * sin(2 * Mj - 6 * Ms - 49),
    };
  }
  return {
    longitude:
      0.04 * sin(Ms - 2 * Mu + 6) + 0.035 * sin(Ms - 3 * Mu + 33) - 0.015 * sin(Mj - Mu + 20),
    latitude: 0,
  };
}

function geocentricPlanet(
  body: Exclude<OrbitingBody, "sun" | "moon">,
  days: number,
  sun: Vector3
): EclipticPoint {
  const orbit = orbitalPosition(MEAN_ELEMENTS[body], days);
  let helio: Vector3 = orbit;

  if (body === "jupiter" || body === "saturn" || body === "uranus") {
    const point = toEcliptic(orbit);
    const delta = giantPerturbations(body, days);
    helio = fromEcliptic(
      {
        longitude: point.longitude + delta.longitude,
        latitude: point.latitude + delta.latitude,
      },
      orbit.r
    );
  }

  return toEcliptic({ x: helio.x + sun.x, y: helio.y + sun.y, z: helio.z + sun.z });
}

function geocentricMoon(days: number, sunLongitude: number): EclipticPoint {
  const elements = MEAN_ELEMENTS.moon;
  const point = toEcliptic(orbitalPosition(elements, days));

  const Ms = meanAnomaly("sun", days);
  const Mm = meanAnomaly("moon", days);
  const Nm = elementAt(elements.node, days);
  const Lm = normalizeDegrees(Mm + elementAt(elements.perihelion, days) + Nm);
  const D = Lm - sunLongitude;
  const F = Lm - Nm;

  const longitude =
    point.longitude -
    1.274 * sin(Mm - 2 * D) +
    0.658 * sin(2 * D) -
    0.186 * sin(Ms) -
    0.059 * sin(2 * Mm - 2 * D) -
    0.057 * sin(Mm - 2 * D + Ms) +
    0.053 * sin(Mm + 2 * D) +
    0.046 * sin(2 * D - Ms) +
    0.041 * sin(Mm - Ms) -
    0.035 * sin(D) -
    0.031 * sin(Mm + Ms) -
    0.015 * sin(2 * F - 2 * D) +
    0.011 * sin(Mm - 4 * D);

  const latitude =
    point.latitude -
    0.173 * sin(F - 2 * D) -
    0.055 * sin(Mm - F - 2 * D) -
    0.046 * sin(Mm + F - 2 * D) +
    0.033 * sin(F + 2 * D) +
    0.017 * sin(2 * Mm + F);

  return { longitude: normalizeDegrees(longitude), latitude };
}

/**
 * Pluto from a periodic series (heliocentric, J2000 equinox).
 */
function geocentricPluto(days: number, sun: Vector3): EclipticPoint {
  const S = 50.03 + 0.033459652 * days;
  const P = 238.95 + 0.003968789 * days;

  const longitude =
    238.9508 +
    0.00400703 * days -
    19.799 * sin(P) +
    19.848 * cos(P) +
    0.897 * sin(2 * P) -
    4.956 * cos(2 * P) +
    0.61 * sin(3 * P) +
    1.211 * cos(3 * P) -
    0.341 * sin(4 * P) -
    0.19 * cos(4 * P) +
    0.128 * sin(5 * P) -
    0.034 * cos(5 * P) -
    0.038 * sin(6 * P) +
    0.031 * cos(6 * P) +
    0.02 * sin(S - P) -
    0.01 * cos(S - P) +
    PRECESSION_DEG_PER_DAY * days;

  const latitude =
    -3.9082 -
    5.453 * sin(P) -
    14.975 * cos(P) +
    3.527 * sin(2 * P) +
    1.673 * cos(2 * P) -
    1.051 * sin(3 * P) +
    0.328 * cos(3 * P) +
    0.179 * sin(4 * P) -
    0.292 * cos(4 * P) +
    0.019 * sin(5 * P) +
    0.1 * cos(5 * P) -
    0.031 * sin(6 * P) -
    0.026 * cos(6 * P) +
    0.011 * cos(S - P);

  const r =
    40.72 +
    6.68 * cos(P) +
    6.9 * sin(P) -
    1.18 * cos(2 * P) -
    0.03 * sin(2 * P) +
    0.15 * cos(3 * P) -
    0.14 * sin(3 * P);

  const helio = fromEcliptic({ longitude, latitude }, r);
  return toEcliptic({ x: helio.x + sun.x, y: helio.y + sun.y, z: helio.z + sun.z });
}

/**
 * Mean ascending lunar node (Meeus, ch. 47).
 */
export function meanLunarNode(julianDay: number): number {
  const T = julianCenturiesFromJ2000(julianDay);
  return normalizeDegrees(
    125.0445479 -
      1934.1362891 * T +
      0.0020754 * T * T +
      (T * T * T) / 467441 -
      (T * T * T * T) / 60616000
  );
}

/**
 * Tropical geocentric ecliptic longitude/latitude for every computed body.
 */
export function approximateEclipticCoordinates(
  julianDay: number
): Record<ComputedBodyId, EclipticPoint> {
  const days = julianDay - ELEMENTS_EPOCH_JULIAN_DAY;
  const sun = sunVector(days);

  return {
    sun: { longitude: sun.longitude, latitude: 0 },
    moon: geocentricMoon(days, sun.longitude),
    mercury: geocentricPlanet("mercury", days, sun.vector),
    venus: geocentricPlanet("venus", days, sun.vector),
    mars: geocentricPlanet("mars", days, sun.vector),
    jupiter: geocentricPlanet("jupiter", days, sun.vector),
    saturn: geocentricPlanet("saturn", days, sun.vector),
    uranus: geocentricPlanet("uranus", days, sun.vector),
    neptune: geocentricPlanet("neptune", days, sun.vector),
    pluto: geocentricPluto(days, sun.vector),
    rahu: { longitude: meanLunarNode(julianDay), latitude: 0 },
  };
}

/**
 * Coordinates plus speed (central difference over one day).
 */
export function approximateTropicalCoordinates(
  julianDay: number
): Record<ComputedBodyId, RawBodyCoordinates> {
  const now = approximateEclipticCoordinates(julianDay);
  const before = approximateEclipticCoordinates(julianDay - SPEED_STEP_DAYS);
  const after = approximateEclipticCoordinates(julianDay + SPEED_STEP_DAYS);

  const withSpeed = (body: ComputedBodyId): RawBodyCoordinates => ({
    longitude: now[body].longitude,
    latitude: now[body].latitude,
    speed_deg_per_day:
      signedDifference(after[body].longitude, before[body].longitude) /
      (2 * SPEED_STEP_DAYS),
  });

  return {
    sun: withSpeed("sun"),
    moon: withSpeed("moon"),
    mercury: withSpeed("mercury"),
    venus: withSpeed("venus"),
    mars: withSpeed("mars"),
    jupiter: withSpeed("jupiter"),
    saturn: withSpeed("saturn"),
    uranus: withSpeed("uranus"),
    neptune: withSpeed("neptune"),
    pluto: withSpeed("pluto"),
    rahu: withSpeed("rahu"),
  };
}

export class ApproximateEphemeris implements EphemerisProvider {
  readonly accuracy = "approximate" as const;

  constructor(private readonly corrector: AyanamshaCorrector = new LahiriAyanamsha()) {}

  positions(instant: Instant, frame: ReferenceFrame): PositionSet {
    assertSupportedInstant(instant);
    return buildPositionSet({
      epoch_ms: instant.epoch_ms,
      julian_day: instant.julian_day,
      frame,
      accuracy: this.accuracy,
      corrector: this.corrector,
      raw: approximateTropicalCoordinates(instant.julian_day),
    });
  }

  ayanamsha(instant: Instant): number {
    assertSupportedInstant(instant);
    return this.corrector.ayanamsha(instant.julian_day);
  }

  close(): void {
    // nothing held
  }
}
