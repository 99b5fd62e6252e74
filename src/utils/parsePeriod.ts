import { ConfigurationError } from "../errors.js";

export const MINUTE_MS = 60 * 1000;

/** A fixed-length duration, or a whole number of calendar months. */
export type Period = { kind: "fixed"; ms: number } | { kind: "calendar"; months: number };

const FIXED_UNITS: Record<string, number> = {
  s: 1000,
  sec: 1000,
  second: 1000,
  seconds: 1000,
  t: MINUTE_MS,
  m: MINUTE_MS,
  min: MINUTE_MS,
  minute: MINUTE_MS,
  minutes: MINUTE_MS,
  h: 60 * MINUTE_MS,
  hour: 60 * MINUTE_MS,
  hours: 60 * MINUTE_MS,
  d: 24 * 60 * MINUTE_MS,
  day: 24 * 60 * MINUTE_MS,
  days: 24 * 60 * MINUTE_MS,
};

// Case-sensitive. Bins always start on the first of the month, so the month-end
// aliases are refused rather than read as minutes ("m").
const CALENDAR_ALIASES = ["MS"];
const MONTH_END_ALIASES = ["M", "ME"];
const CALENDAR_UNITS = ["month", "months"];

/**
 * Converts a period string into a `Period`. Accepts resampling aliases
 * ("h", "15min", "2H", "D", "MS") and spelled-out durations ("1 hour", "15 minutes", "1 month").
 * "MS" is one calendar month starting on the first; a lowercase "m" means minutes.
 *
 * @throws ConfigurationError for anything else, a month-end alias ("M", "ME") or a zero-length period
 */
export function parsePeriod(periodStr: string): Period {
  const match = periodStr.trim().match(/^(\d+)?\s*([a-z]+)$/i);
  if (!match) throw new ConfigurationError(`Unrecognized period "${periodStr}"`);

  const value = match[1] === undefined ? 1 : parseInt(match[1], 10);
  const unit = match[2].toLowerCase();

  if (MONTH_END_ALIASES.includes(match[2])) {
    throw new ConfigurationError(`Month-end period "${periodStr}" is not supported; use "MS" or "month"`);
  }
  if (value === 0) throw new ConfigurationError(`Period "${periodStr}" has zero length`);

  if (CALENDAR_ALIASES.includes(match[2]) || CALENDAR_UNITS.includes(unit)) {
    return { kind: "calendar", months: value };
  }
  if (Object.hasOwn(FIXED_UNITS, unit)) return { kind: "fixed", ms: value * FIXED_UNITS[unit] };

  throw new ConfigurationError(`Unrecognized period "${periodStr}"`);
}

/** Length of a fixed period; calendar periods have none. */
export function fixedLength(period: Period, purpose: string): number {
  if (period.kind !== "fixed") {
    throw new ConfigurationError(`${purpose} needs a fixed-length period, not ${period.months} calendar month(s)`);
  }
  return period.ms;
}
