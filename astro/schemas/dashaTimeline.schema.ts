import { z } from "zod";
import { DASHA_LEVEL_NAMES, DASHA_LORDS } from "../dasha/vimshottari.js";
import { UtcIsoSchema } from "./common.schema.js";

export const DashaPeriodSchema = z
  .object({
    id: z.number().int().nonnegative(),
    parent_id: z.number().int().nonnegative().nullable(),
    lord: z.enum(DASHA_LORDS),
    level: z.number().int().min(1).max(5),
    level_name: z.enum(DASHA_LEVEL_NAMES),
    start: UtcIsoSchema,
    end: UtcIsoSchema,
    start_ms: z.number().int(),
    end_ms: z.number().int(),
    duration_days: z.number().positive(),
  })
  .refine((p) => p.end_ms > p.start_ms, { message: "period must have positive length" });

export const DashaTimelineSchema = z.object({
  birth: UtcIsoSchema,
  until: UtcIsoSchema,
  max_level: z.number().int().min(1).max(5),
  starting_dasha: z.object({
    lord: z.enum(DASHA_LORDS),
    nakshatra: z.string().min(1),
    balance_years: z.number().positive(),
    fraction_elapsed: z.number().min(0).lt(1),
  }),
  periods: z.array(DashaPeriodSchema),
  levels: z.object({
    mahadasha: z.array(DashaPeriodSchema),
    antardasha: z.array(DashaPeriodSchema),
    pratyantardasha: z.array(DashaPeriodSchema),
    sookshma: z.array(DashaPeriodSchema),
    prana: z.array(DashaPeriodSchema),
  }),
});
