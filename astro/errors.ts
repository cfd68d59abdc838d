/**
 * Error model for the computation core.
 * Every failure is local to one request; nothing here is retried internally.
 */

export class UnsupportedDateRangeError extends RangeError {
  constructor(
    public utc: string,
    public years_from_epoch: number,
    public max_years: number
  ) {
    super(
      `Instant ${utc} is ${Math.abs(years_from_epoch).toFixed(1)} years from J2000.0; ` +
        `supported range is ±${max_years} years`
    );
    this.name = "UnsupportedDateRangeError";
  }
}

export class InvalidInputError extends Error {
  constructor(
    public subject: string,
    public issues: string[]
  ) {
    super(`Invalid ${subject}: ${issues.join("; ")}`);
    this.name = "InvalidInputError";
  }
}

export class EphemerisUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EphemerisUnavailableError";
  }
}

export class EphemerisCalculationError extends Error {
  constructor(
    public body: string,
    message: string
  ) {
    super(`Ephemeris calculation failed for ${body}: ${message}`);
    this.name = "EphemerisCalculationError";
  }
}
