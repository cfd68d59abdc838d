import { z } from "zod";
import { BodyIdSchema, LongitudeDegSchema, perBody, SignSchema, UtcIsoSchema } from "./common.schema.js";

const FrameSchema = z.enum(["tropical", "sidereal"]);
const AccuracySchema = z.enum(["precise", "approximate"]);

export const BodyPositionSchema = z.object({
  body: BodyIdSchema,
  longitude: LongitudeDegSchema,
  latitude: z.number().min(-90).max(90),
  speed_deg_per_day: z.number().finite(),
  retrograde: z.boolean(),
  frame: FrameSchema,
  accuracy: AccuracySchema,
  sign: SignSchema,
  sign_degree: z.number().min(0).lt(30),
});

export const PositionSetSchema = z
  .object({
    computed_at: UtcIsoSchema,
    julian_day: z.number().finite(),
    frame: FrameSchema,
    accuracy: AccuracySchema,
    ayanamsha_deg: z.number().finite().nullable(),
    bodies: perBody(BodyPositionSchema),
  })
  .refine((set) => (set.frame === "sidereal") === (set.ayanamsha_deg !== null), {
    message: "ayanamsha_deg is set exactly when the frame is sidereal",
    path: ["ayanamsha_deg"],
  });

export type PositionSetShape = z.infer<typeof PositionSetSchema>;
