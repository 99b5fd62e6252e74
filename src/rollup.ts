import { TZDate } from "@date-fns/tz";
import { addMonths, startOfDay, startOfMonth } from "date-fns";
import { ConfigurationError } from "./errors.js";
import { TimeSeriesTable, RollupPolicy, ROLLUP_POLICIES } from "./types.js";
import { fixedLength, MINUTE_MS, parsePeriod, Period } from "./utils/parsePeriod.js";

/** Longest run of missing steps filled from each side when upsampling. */
export const INTERPOLATION_LIMIT_MINUTES = 60;

export interface RollupOptions {
  /** Upsample to minute resolution (with interpolation) before aggregating. Defaults to true. */
  upsampleFirst?: boolean;
}

type NumericColumns = Record<string, (number | null)[]>;

interface NumericSeries {
  index: number[];
  columns: NumericColumns;
}

type Closed = "left" | "right";

/** Maps an instant to the label of its bin and walks from one label to the next. */
interface Binner {
  label(t: number): number;
  next(label: number): number;
}

const utc = (ms: number) => new TZDate(ms, "UTC");

function toNumericSeries(table: TimeSeriesTable): NumericSeries {
  const order = table.index.map((_, i) => i).sort((a, b) => table.index[a] - table.index[b]);
  const columns: NumericColumns = {};

  for (const [name, values] of Object.entries(table.columns)) {
    columns[name] = order.map((i) => {
      const value = values[i];
      if (value === null) return null;
      if (typeof value !== "number") {
        throw new ConfigurationError(`Column "${name}" is not numeric and cannot be rolled up`);
      }
      return Number.isFinite(value) ? value : null;
    });
  }

  return { index: order.map((i) => table.index[i]), columns };
}

function toTable(series: NumericSeries, timeZone: string): TimeSeriesTable {
  return { index: series.index, columns: series.columns, timeZone };
}

function resolvePeriod(period: string | Period): Period {
  return typeof period === "string" ? parsePeriod(period) : period;
}

/**
 * Bins of a fixed length, anchored at UTC midnight of the first sample's day.
 * Left-closed bins are labelled with their start, right-closed bins with their end.
 */
function fixedBinner(first: number, ms: number, closed: Closed): Binner {
  const origin = startOfDay(utc(first)).getTime();
  const round = closed === "left" ? Math.floor : Math.ceil;
  return {
    label: (t) => origin + round((t - origin) / ms) * ms,
    next: (label) => label + ms,
  };
}

/** Bins of whole calendar months (UTC), counted from the first sample's month. */
function calendarBinner(first: number, months: number, closed: Closed): Binner {
  const anchor = startOfMonth(utc(first));
  const monthsFromAnchor = (t: number) => {
    const d = utc(t);
    return (d.getFullYear() - anchor.getFullYear()) * 12 + d.getMonth() - anchor.getMonth();
  };
  const boundary = (k: number) => addMonths(anchor, k * months).getTime();

  return {
    label: (t) => {
      const k = Math.floor(monthsFromAnchor(t) / months);
      const start = boundary(k);
      if (closed === "left" || t === start) return start;
      return boundary(k + 1);
    },
    next: (label) => addMonths(utc(label), months).getTime(),
  };
}

function binnerFor(period: Period, first: number, closed: Closed): Binner {
  return period.kind === "fixed"
    ? fixedBinner(first, period.ms, closed)
    : calendarBinner(first, period.months, closed);
}

/**
 * Aggregate sorted samples into consecutive bins. Every bin between the first and
 * last populated one is emitted; empty bins yield null.
 */
function aggregate(series: NumericSeries, binner: Binner, reducer: "mean" | "first"): NumericSeries {
  if (series.index.length === 0) {
    return { index: [], columns: Object.fromEntries(Object.keys(series.columns).map((name) => [name, []])) };
  }

  const labels = series.index.map((t) => binner.label(t));
  const lastLabel = labels[labels.length - 1];
  const index: number[] = [];
  const position = new Map<number, number>();
  for (let label = labels[0]; label <= lastLabel; label = binner.next(label)) {
    position.set(label, index.length);
    index.push(label);
  }

  const columns: NumericColumns = {};
  for (const [name, values] of Object.entries(series.columns)) {
    const sums = new Array<number>(index.length).fill(0);
    const counts = new Array<number>(index.length).fill(0);
    const firsts = new Array<number | null>(index.length).fill(null);

    values.forEach((value, i) => {
      if (value === null) return;
      const bin = position.get(labels[i]);
      if (bin === undefined) return;
      sums[bin] += value;
      counts[bin] += 1;
      if (firsts[bin] === null) firsts[bin] = value;
    });

    columns[name] =
      reducer === "first" ? firsts : sums.map((sum, bin) => (counts[bin] === 0 ? null : sum / counts[bin]));
  }

  return { index, columns };
}

/**
 * Linear interpolation over missing entries. A gap entry is filled when it lies
 * within `limit` positions after a known value or `limit` positions before one;
 * outside the known range it takes the nearest known value.
 */
export function interpolateLinear(values: (number | null)[], limit = INTERPOLATION_LIMIT_MINUTES): (number | null)[] {
  const out = values.slice();
  const known: number[] = [];
  values.forEach((value, i) => {
    if (value !== null) known.push(i);
  });
  if (known.length === 0) return out;

  for (let i = 0; i < out.length; i++) {
    if (out[i] !== null) continue;

    // binary search for the first known index after i
    let lo = 0;
    let hi = known.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (known[mid] < i) lo = mid + 1;
      else hi = mid;
    }
    const prev = lo > 0 ? known[lo - 1] : undefined;
    const next = lo < known.length ? known[lo] : undefined;

    const nearPrev = prev !== undefined && i - prev <= limit;
    const nearNext = next !== undefined && next - i <= limit;
    if (!nearPrev && !nearNext) continue;

    const prevValue = prev !== undefined ? values[prev] : null;
    const nextValue = next !== undefined ? values[next] : null;
    if (prev !== undefined && next !== undefined && prevValue !== null && nextValue !== null) {
      out[i] = prevValue + ((nextValue - prevValue) * (i - prev)) / (next - prev);
    } else {
      out[i] = prevValue ?? nextValue;
    }
  }

  return out;
}

function upsampleSeries(series: NumericSeries, ms = MINUTE_MS): NumericSeries {
  const steps = aggregate(series, fixedBinner(series.index[0] ?? 0, ms, "left"), "mean");
  const columns: NumericColumns = {};
  for (const [name, values] of Object.entries(steps.columns)) {
    columns[name] = interpolateLinear(values);
  }
  return { index: steps.index, columns };
}

/**
 * Resample to a regular grid, one minute by default: samples within the same step
 * are averaged, then up to `INTERPOLATION_LIMIT_MINUTES` missing steps on either side
 * of a known value are linearly interpolated. Calendar periods are rejected.
 */
export function upsample(table: TimeSeriesTable, period: string | Period = "min"): TimeSeriesTable {
  const ms = fixedLength(resolvePeriod(period), "Upsampling");
  return toTable(upsampleSeries(toNumericSeries(table), ms), table.timeZone);
}

// rollups always upsample to minutes
function prepare(table: TimeSeriesTable, upsampleFirst: boolean): NumericSeries {
  const series = toNumericSeries(table);
  return upsampleFirst ? upsampleSeries(series) : series;
}

/** Average over `[start, start + period)`, labelled with the period start. */
export function rollupStarting(
  table: TimeSeriesTable,
  period: string | Period = "h",
  { upsampleFirst = true }: RollupOptions = {}
): TimeSeriesTable {
  const p = resolvePeriod(period);
  const series = prepare(table, upsampleFirst);
  const binner = binnerFor(p, series.index[0] ?? 0, "left");
  return toTable(aggregate(series, binner, "mean"), table.timeZone);
}

/** Average over `(start, start + period]`, labelled with the period end. */
export function rollupEnding(
  table: TimeSeriesTable,
  period: string | Period = "h",
  { upsampleFirst = true }: RollupOptions = {}
): TimeSeriesTable {
  const p = resolvePeriod(period);
  const series = prepare(table, upsampleFirst);
  const binner = binnerFor(p, series.index[0] ?? 0, "right");
  return toTable(aggregate(series, binner, "mean"), table.timeZone);
}

/**
 * Average centred on each label: samples are shifted forward by half a period and
 * then rolled up as in `rollupStarting`. Calendar periods have no fixed half and are rejected.
 */
export function rollupMidpoint(
  table: TimeSeriesTable,
  period: string | Period = "h",
  { upsampleFirst = true }: RollupOptions = {}
): TimeSeriesTable {
  const p = resolvePeriod(period);
  const half = fixedLength(p, "Midpoint rollup") / 2;
  const series = prepare(table, upsampleFirst);
  const shifted = { index: series.index.map((t) => t + half), columns: series.columns };
  const binner = binnerFor(p, shifted.index[0] ?? 0, "left");
  return toTable(aggregate(shifted, binner, "mean"), table.timeZone);
}

/** First non-null value in each `[start, start + period)` bin, labelled with the period start. */
export function rollupInstant(
  table: TimeSeriesTable,
  period: string | Period = "h",
  { upsampleFirst = true }: RollupOptions = {}
): TimeSeriesTable {
  const p = resolvePeriod(period);
  const series = prepare(table, upsampleFirst);
  const binner = binnerFor(p, series.index[0] ?? 0, "left");
  return toTable(aggregate(series, binner, "first"), table.timeZone);
}

export function isRollupPolicy(name: string): name is RollupPolicy {
  return ROLLUP_POLICIES.some((policy) => policy === name);
}

const ROLLUPS: Record<RollupPolicy, typeof rollupStarting> = {
  starting: rollupStarting,
  ending: rollupEnding,
  midpoint: rollupMidpoint,
  instant: rollupInstant,
};

export function rollup(
  policy: string,
  table: TimeSeriesTable,
  period: string | Period = "h",
  options: RollupOptions = {}
): TimeSeriesTable {
  if (!isRollupPolicy(policy)) {
    throw new ConfigurationError(`Invalid rollup "${policy}"; expected one of ${ROLLUP_POLICIES.join(", ")}`);
  }
  return ROLLUPS[policy](table, period, options);
}
