import { z } from "zod";
import { BodyIdSchema, perBody } from "./common.schema.js";

const Score = z.number().min(0).max(100);

const DomainScoresSchema = z.object({
  career: Score,
  relationship: Score,
  health: Score,
  spiritual: Score,
});

export const StrengthScoreSchema = z.object({
  body: BodyIdSchema,
  positional: Score,
  directional: Score.nullable(),
  temporal: Score,
  composite: Score,
  dignity: z.enum(["exalted", "own", "friendly", "neutral", "enemy", "debilitated"]),
  house: z.number().int().min(1).max(12).nullable(),
  domain_impact: DomainScoresSchema,
});

export const StrengthReportSchema = z
  .object({
    strength_policy_version: z.string(),
    scores: perBody(StrengthScoreSchema),
    domain_impact: DomainScoresSchema,
    directional_available: z.boolean(),
    is_day_birth: z.boolean().nullable(),
  })
  .refine(
    (r) =>
      Object.values(r.scores).every(
        (s) => (s.directional === null) === !r.directional_available
      ),
    { message: "directional scores must match directional_available" }
  );
