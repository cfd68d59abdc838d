export * from "./angles.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./instant.js";

export * from "./ephemeris/types.js";
export * from "./ephemeris/ayanamsha.js";
export { ApproximateEphemeris } from "./ephemeris/approximateEphemeris.js";
export { SwissEphemeris } from "./ephemeris/swisseph.js";
export { PositionCache } from "./ephemeris/positionCache.js";
export {
  CachedEphemeris,
  createEphemerisProvider,
  withEphemeris,
} from "./ephemeris/ephemerisProvider.js";
export * from "./ephemeris/houses.js";

export * from "./nakshatra/nakshatra.js";

export * from "./dasha/vimshottari.js";
export * from "./dasha/startingDasha.js";
export * from "./dasha/assembleDashaTimeline.js";
export * from "./dasha/dashaTransitions.js";

export * from "./strength/policy/strengthPolicy.v1.js";
export * from "./strength/scorePlanetaryStrength.js";
export * from "./strength/dashaImpact.js";

export * from "./aspects/policy/aspectPolicy.v1.js";
export * from "./aspects/computeAspects.js";
export * from "./aspects/classifyPulse.js";
export * from "./aspects/findTransitAspects.js";
export * from "./aspects/synastryActivation.js";

export * from "./chart/computeBirthChart.js";

export { PositionSetSchema } from "./schemas/positionSet.schema.js";
export { DashaTimelineSchema } from "./schemas/dashaTimeline.schema.js";
export { StrengthReportSchema } from "./schemas/strengthReport.schema.js";
export { AspectEventSchema, PulseReadingSchema } from "./schemas/aspectEvent.schema.js";
