import { z } from "zod";
import { ASPECT_TYPES } from "../aspects/policy/aspectPolicy.v1.js";
import { BodyIdSchema, UtcIsoSchema } from "./common.schema.js";

export const AspectEventSchema = z
  .object({
    body_a: BodyIdSchema,
    body_b: BodyIdSchema,
    type: z.enum(ASPECT_TYPES),
    separation_deg: z.number().min(0).max(180),
    orb_deg: z.number().min(0),
    orb_allowed_deg: z.number().min(0),
    exact_at: UtcIsoSchema.nullable(),
  })
  .refine((e) => e.orb_deg <= e.orb_allowed_deg, {
    message: "orb must be within the allowed orb",
    path: ["orb_deg"],
  });

export const PulseReadingSchema = z.object({
  label: z.enum(["flowing", "electric", "magnetic", "grounded", "friction"]),
  net_tally: z.number().finite(),
  harmonious: z.number().min(0),
  challenging: z.number().min(0),
  amplifying: z.number().min(0),
  score: z.number().min(0).max(100),
});
