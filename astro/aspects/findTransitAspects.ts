import { z } from "zod";
import { astroLogHelpers } from "../../logging/astroLog.js";
import { angularSeparation, signedDifference } from "../angles.js";
import { InvalidInputError } from "../errors.js";
import { BODY_IDS, type BodyId, type EphemerisProvider, type ReferenceFrame } from "../ephemeris/types.js";
import {
  createInstant,
  epochMsFromUtcInput,
  shiftInstant,
  toUtcIso,
  UtcInputSchema,
  type UtcInput,
} from "../instant.js";
import { parseInput } from "../validation.js";
import { validateOrbTable, type AspectBodies, type AspectEvent } from "./computeAspects.js";
import {
  allowedOrb,
  ASPECT_ANGLES,
  ASPECT_POLICY_V1,
  ASPECT_TYPES,
  type AspectType,
  type OrbTable,
} from "./policy/aspectPolicy.v1.js";

const MS_PER_HOUR = 3_600_000;
/** Bisection stops once the bracket is this narrow */
const EXACT_TOLERANCE_MS = 60_000;
const MAX_SAMPLES = 100_000;
/**
 * Largest arc a tracked body may cover between two samples. Beyond it a
 * crossing can fall between samples unseen.
 */
export const MAX_STEP_MOTION_DEG = 45;

export interface TransitWindowInput {
  natal: AspectBodies;
  provider: EphemerisProvider;
  start: UtcInput;
  end: UtcInput;
  /** Sampling interval, default 6 hours */
  step_hours?: number;
  /** Frame of the natal longitudes, default sidereal */
  frame?: ReferenceFrame;
  orbs?: OrbTable;
  /** Transiting bodies to track, default all */
  transiting?: BodyId[];
}

const TransitWindowSchema = z.object({
  start: UtcInputSchema,
  end: UtcInputSchema,
  step_hours: z.number().finite().positive().max(24 * 30).default(6),
  frame: z.enum(["tropical", "sidereal"]).default("sidereal"),
  transiting: z.array(z.enum(BODY_IDS)).min(1).default([...BODY_IDS]),
});

interface Sample {
  epoch_ms: number;
  longitudes: Record<BodyId, number>;
  speeds: Record<BodyId, number>;
}

interface Crossing {
  /** Index of the sample before the crossing (or at it, when exact) */
  after_index: number;
  epoch_ms: number;
}

/**
 * Offsets from the natal longitude at which the aspect is exact. Conjunction
 * and opposition have one; the others form on either side.
 */
function aspectOffsets(type: AspectType): number[] {
  const angle = ASPECT_ANGLES[type];
  return angle === 0 || angle === 180 ? [angle] : [angle, -angle];
}

function sampleTimes(startMs: number, endMs: number, stepMs: number): number[] {
  const count = Math.floor((endMs - startMs) / stepMs) + 1;
  if (count > MAX_SAMPLES) {
    throw new InvalidInputError("transit window", [
      `window needs ${count} samples; widen step_hours (limit ${MAX_SAMPLES})`,
    ]);
  }
  const times: number[] = [];
  for (let i = 0; i < count; i++) times.push(startMs + i * stepMs);
  if (times[times.length - 1] !== endMs) times.push(endMs);
  return times;
}

/**
 * Sign change of the signed deviation between two samples. A jump across
 * the far side of the circle flips the sign too, but by about 360°, so the
 * size of the step tells them apart.
 */
function crossesZero(before: number, after: number): boolean {
  if (before === 0 || after === 0) return false;
  return Math.sign(before) !== Math.sign(after) && Math.abs(after - before) < 90;
}

/**
 * Reject a step so coarse that a tracked body outruns the crossing check.
 */
function assertStepResolvesMotion(samples: Sample[], bodies: BodyId[], stepHours: number): void {
  for (const body of bodies) {
    const fastest = samples.reduce((max, s) => Math.max(max, Math.abs(s.speeds[body])), 0);
    const motion = (fastest * stepHours) / 24;
    if (motion > MAX_STEP_MOTION_DEG) {
      const limit = Math.floor((MAX_STEP_MOTION_DEG / fastest) * 24);
      throw new InvalidInputError("transit window", [
        `step_hours: ${body} moves up to ${motion.toFixed(1)}° per step; ` +
          `use at most ${limit} hours (limit ${MAX_STEP_MOTION_DEG}° per step)`,
      ]);
    }
  }
}

function bisect(
  loMs: number,
  hiMs: number,
  deviationLo: number,
  deviationAt: (epochMs: number) => number
): number {
  let lo = loMs;
  let hi = hiMs;
  let sLo = deviationLo;
  while (hi - lo > EXACT_TOLERANCE_MS) {
    const mid = Math.floor((lo + hi) / 2);
    const sMid = deviationAt(mid);
    if (sMid === 0) return mid;
    if (Math.sign(sMid) === Math.sign(sLo)) {
      lo = mid;
      sLo = sMid;
    } else {
      hi = mid;
    }
  }
  return Math.round((lo + hi) / 2);
}

/**
 * Scan a window of transiting positions against natal longitudes.
 *
 * Every exact crossing becomes one event with `exact_at`; an in-orb stretch
 * with no crossing becomes one event with `exact_at: null`, reported at its
 * tightest sample.
 */
export function findTransitAspects(input: TransitWindowInput): AspectEvent[] {
  const parsed = parseInput(TransitWindowSchema, input, "transit window");
  const orbs = validateOrbTable(input.orbs ?? ASPECT_POLICY_V1.orbs);
  const startMs = epochMsFromUtcInput(parsed.start);
  const endMs = epochMsFromUtcInput(parsed.end);
  if (endMs < startMs) {
    throw new InvalidInputError("transit window", ["end: must not be before start"]);
  }

  const provider = input.provider;
  const frame = parsed.frame;
  const base = createInstant({ utc: toUtcIso(startMs), latitude: 0, longitude: 0 });
  const sampleAt = (epochMs: number): Sample => {
    const { bodies } = provider.positions(shiftInstant(base, epochMs), frame);
    const pick = (field: "longitude" | "speed_deg_per_day"): Record<BodyId, number> => ({
      sun: bodies.sun[field],
      moon: bodies.moon[field],
      mercury: bodies.mercury[field],
      venus: bodies.venus[field],
      mars: bodies.mars[field],
      jupiter: bodies.jupiter[field],
      saturn: bodies.saturn[field],
      uranus: bodies.uranus[field],
      neptune: bodies.neptune[field],
      pluto: bodies.pluto[field],
      rahu: bodies.rahu[field],
      ketu: bodies.ketu[field],
    });
    return { epoch_ms: epochMs, longitudes: pick("longitude"), speeds: pick("speed_deg_per_day") };
  };
  const longitudesAt = (epochMs: number) => sampleAt(epochMs).longitudes;

  const samples: Sample[] = sampleTimes(startMs, endMs, parsed.step_hours * MS_PER_HOUR).map(
    sampleAt
  );
  assertStepResolvesMotion(samples, parsed.transiting, parsed.step_hours);

  const found: Array<{ at: number; event: AspectEvent }> = [];

  for (const transiting of parsed.transiting) {
    for (const natalBody of BODY_IDS) {
      const natalLon = input.natal[natalBody]?.longitude;
      if (natalLon === undefined) continue;

      for (const type of ASPECT_TYPES) {
        const allowed = allowedOrb(orbs, type, transiting, natalBody);

        for (const offset of aspectOffsets(type)) {
          const target = natalLon + offset;
          const deviations = samples.map((s) => signedDifference(s.longitudes[transiting], target));
          const deviationAt = (epochMs: number) =>
            signedDifference(longitudesAt(epochMs)[transiting], target);

          const crossings: Crossing[] = [];
          deviations.forEach((s, i) => {
            if (s === 0) {
              crossings.push({ after_index: i, epoch_ms: samples[i].epoch_ms });
            } else if (i + 1 < deviations.length && crossesZero(s, deviations[i + 1])) {
              crossings.push({
                after_index: i,
                epoch_ms: bisect(samples[i].epoch_ms, samples[i + 1].epoch_ms, s, deviationAt),
              });
            }
          });

          const makeEvent = (
            transitLon: number,
            deviation: number,
            exactAt: number | null
          ): AspectEvent => ({
            body_a: transiting,
            body_b: natalBody,
            type,
            separation_deg: Number(angularSeparation(transitLon, natalLon).toFixed(4)),
            orb_deg: Number(Math.abs(deviation).toFixed(4)),
            orb_allowed_deg: allowed,
            exact_at: exactAt === null ? null : toUtcIso(exactAt),
          });

          for (const crossing of crossings) {
            const lon = longitudesAt(crossing.epoch_ms)[transiting];
            found.push({
              at: crossing.epoch_ms,
              event: makeEvent(lon, signedDifference(lon, target), crossing.epoch_ms),
            });
          }

          // in-orb stretches that never reach exactness
          let i = 0;
          while (i < deviations.length) {
            if (Math.abs(deviations[i]) > allowed) {
              i++;
              continue;
            }
            const runStart = i;
            while (i + 1 < deviations.length && Math.abs(deviations[i + 1]) <= allowed) i++;
            const runEnd = i;
            i++;

            const touched = crossings.some(
              (c) => c.after_index >= runStart - 1 && c.after_index <= runEnd
            );
            if (touched) continue;

            let tightest = runStart;
            for (let k = runStart + 1; k <= runEnd; k++) {
              if (Math.abs(deviations[k]) < Math.abs(deviations[tightest])) tightest = k;
            }
            found.push({
              at: samples[tightest].epoch_ms,
              event: makeEvent(samples[tightest].longitudes[transiting], deviations[tightest], null),
            });
          }
        }
      }
    }
  }

  const order = (body: BodyId) => BODY_IDS.indexOf(body);
  found.sort(
    (a, b) =>
      a.at - b.at ||
      order(a.event.body_a) - order(b.event.body_a) ||
      order(a.event.body_b) - order(b.event.body_b) ||
      ASPECT_TYPES.indexOf(a.event.type) - ASPECT_TYPES.indexOf(b.event.type)
  );

  astroLogHelpers.transitWindowScanned({
    start: toUtcIso(startMs),
    end: toUtcIso(endMs),
    sample_count: samples.length,
    event_count: found.length,
  });

  return found.map((f) => f.event);
}
