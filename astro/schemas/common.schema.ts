import { z } from "zod";
import { SIGN_NAMES } from "../angles.js";
import { BODY_IDS } from "../ephemeris/types.js";

/** toISOString() output, including the six-digit years outside 0000-9999 */
export const UtcIsoSchema = z
  .string()
  .regex(/^(?:\d{4}|[+-]\d{6})-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);

export const LongitudeDegSchema = z.number().min(0).lt(360);
export const SignSchema = z.enum(SIGN_NAMES);
export const BodyIdSchema = z.enum(BODY_IDS);

export function perBody<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    sun: schema,
    moon: schema,
    mercury: schema,
    venus: schema,
    mars: schema,
    jupiter: schema,
    saturn: schema,
    uranus: schema,
    neptune: schema,
    pluto: schema,
    rahu: schema,
    ketu: schema,
  });
}
