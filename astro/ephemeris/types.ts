import type { SignName } from "../angles.js";
import type { Instant } from "../instant.js";

export const BODY_IDS = [
  "sun",
  "moon",
  "mercury",
  "venus",
  "mars",
  "jupiter",
  "saturn",
  "uranus",
  "neptune",
  "pluto",
  "rahu",
  "ketu",
] as const;

export type BodyId = (typeof BODY_IDS)[number];

export type ReferenceFrame = "tropical" | "sidereal";
export type Accuracy = "precise" | "approximate";

export interface BodyPosition {
  body: BodyId;
  /** Ecliptic longitude in [0, 360) */
  longitude: number;
  latitude: number;
  speed_deg_per_day: number;
  retrograde: boolean;
  frame: ReferenceFrame;
  accuracy: Accuracy;
  sign: SignName;
  sign_degree: number;
}

export interface PositionSet {
  /** ISO instant the positions were computed for (after cache rounding) */
  computed_at: string;
  julian_day: number;
  frame: ReferenceFrame;
  accuracy: Accuracy;
  /** Offset subtracted from tropical longitudes; null in the tropical frame */
  ayanamsha_deg: number | null;
  bodies: Record<BodyId, BodyPosition>;
}

/**
 * Tropical geocentric coordinates for one body, before framing.
 */
export interface RawBodyCoordinates {
  longitude: number;
  latitude: number;
  speed_deg_per_day: number;
}

/**
 * Capability both strategies implement. Selected once at startup.
 */
export interface EphemerisProvider {
  readonly accuracy: Accuracy;
  positions(instant: Instant, frame: ReferenceFrame): PositionSet;
  /** Ayanamsha in degrees at the instant */
  ayanamsha(instant: Instant): number;
  /** Release the underlying data source. Idempotent. */
  close(): void;
}

export interface AyanamshaCorrector {
  readonly name: string;
  ayanamsha(julianDay: number): number;
  toSidereal(tropicalLongitude: number, julianDay: number): number;
}
