import { DateTime, IANAZone } from "luxon";
import { z } from "zod";
import { parseInput } from "./validation.js";

/**
 * A UTC point in time tied to a place on Earth.
 * Immutable; create one per request with createInstant().
 */
export interface Instant {
  readonly utc: string;
  readonly epoch_ms: number;
  readonly julian_day: number;
  readonly latitude: number;
  readonly longitude: number;
  readonly timezone: string;
}

export const MS_PER_DAY = 86_400_000;
export const JULIAN_DAY_UNIX_EPOCH = 2440587.5;
export const J2000_JULIAN_DAY = 2451545.0;

export const LatitudeSchema = z.number().finite().min(-90).max(90);
export const LongitudeSchema = z.number().finite().min(-180).max(180);
export const TimezoneSchema = z
  .string()
  .min(1)
  .refine((zone) => IANAZone.isValidZone(zone), {
    message: "must be a valid IANA timezone identifier",
  });

/** ISO-8601 datetime with an offset or Z, or a valid Date */
export const UtcInputSchema = z.union([
  z.string().datetime({ offset: true }),
  z.date().refine((d) => Number.isFinite(d.getTime()), { message: "invalid Date" }),
]);

export type UtcInput = z.input<typeof UtcInputSchema>;

export const InstantInputSchema = z.object({
  utc: UtcInputSchema,
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  timezone: TimezoneSchema.default("UTC"),
});

export type InstantInput = z.input<typeof InstantInputSchema>;

export function julianDayFromEpochMs(epochMs: number): number {
  return epochMs / MS_PER_DAY + JULIAN_DAY_UNIX_EPOCH;
}

export function epochMsFromJulianDay(julianDay: number): number {
  return (julianDay - JULIAN_DAY_UNIX_EPOCH) * MS_PER_DAY;
}

export function toUtcIso(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

/**
 * Milliseconds since the Unix epoch for an already validated UTC input.
 */
export function epochMsFromUtcInput(value: z.output<typeof UtcInputSchema>): number {
  return typeof value === "string"
    ? DateTime.fromISO(value, { setZone: true }).toMillis()
    : value.getTime();
}

/**
 * Validate and freeze an instant. Coordinates are never clamped.
 */
export function createInstant(input: InstantInput): Instant {
  const parsed = parseInput(InstantInputSchema, input, "instant");
  const epochMs = epochMsFromUtcInput(parsed.utc);

  return Object.freeze({
    utc: toUtcIso(epochMs),
    epoch_ms: epochMs,
    julian_day: julianDayFromEpochMs(epochMs),
    latitude: parsed.latitude,
    longitude: parsed.longitude,
    timezone: parsed.timezone,
  });
}

/**
 * Same place, different moment. Used when sampling a transit window.
 */
export function shiftInstant(instant: Instant, epochMs: number): Instant {
  return Object.freeze({
    ...instant,
    utc: toUtcIso(epochMs),
    epoch_ms: epochMs,
    julian_day: julianDayFromEpochMs(epochMs),
  });
}
