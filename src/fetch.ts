import { ConfigurationError, FormatError } from "./errors.js";
import { parseLines } from "./isd/parser.js";
import { isRollupPolicy, rollup } from "./rollup.js";
import { Station } from "./stations.js";
import {
  AGGREGABLE_COLUMNS,
  ColumnOptions,
  convertTimeZone,
  pickColumns,
  recordsToTable,
  resolveColumns,
  validateTimeZone,
} from "./table.js";
import { Transport } from "./transport.js";
import { IsdRecord, ROLLUP_POLICIES, TimeSeriesTable } from "./types.js";
import { fixedLength, parsePeriod } from "./utils/parsePeriod.js";

export interface FetchTableOptions extends ColumnOptions {
  /** Resample to this period ("h", "15min", "1 day", ...). Observation times are kept when omitted. */
  period?: string;
  /** How values align to `period`: "starting", "ending" (default), "midpoint" or "instant". */
  rollup?: string;
  /** Upsample to minute resolution before rolling up. Defaults to true. */
  upsampleFirst?: boolean;
  /** Zone the timestamps are rendered in. Computation always happens in UTC. */
  timeZone?: string;
}

function decodeText(bytes: Uint8Array, filename: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new FormatError(`File is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`, { source: filename });
  }
}

/** Stable sort on observation time; records with equal times keep file and line order. */
export function sortByTimestamp(records: readonly IsdRecord[]): IsdRecord[] {
  return [...records].sort((a, b) => a.control.dt.getTime() - b.control.dt.getTime());
}

/**
 * Download and decode every data file of a station for the given years. Repeated
 * years are read once. Files are read concurrently; the first failure rejects the whole fetch.
 */
export async function fetchRecords(
  station: Station,
  years: number | readonly number[],
  transport: Transport
): Promise<IsdRecord[]> {
  const yearList = [...new Set(typeof years === "number" ? [years] : years)];
  const filenames = yearList.flatMap((year) => station.getFilenames(year));

  const perFile = await Promise.all(
    filenames.map(async (filename) => {
      const bytes = await transport.open(filename);
      return parseLines(decodeText(bytes, filename), filename);
    })
  );

  return sortByTimestamp(perFile.flat());
}

/**
 * Fetch a station's observations as a time-indexed table, optionally rolled up to a
 * regular period. Every option is checked before any file is requested.
 */
export async function fetchTable(
  station: Station,
  years: number | readonly number[],
  transport: Transport,
  options: FetchTableOptions = {}
): Promise<TimeSeriesTable> {
  const { rollup: policy = "ending", upsampleFirst = true } = options;

  const columns = resolveColumns(options);
  if (!isRollupPolicy(policy)) {
    throw new ConfigurationError(`Invalid rollup "${policy}"; expected one of ${ROLLUP_POLICIES.join(", ")}`);
  }
  const period = options.period !== undefined ? parsePeriod(options.period) : undefined;
  if (period && policy === "midpoint") fixedLength(period, "Midpoint rollup");
  const timeZone = validateTimeZone(options.timeZone ?? "UTC");

  const records = await fetchRecords(station, years, transport);
  let table = recordsToTable(records, columns);

  if (period) {
    table = rollup(policy, pickColumns(table, AGGREGABLE_COLUMNS), period, { upsampleFirst });
  }

  return convertTimeZone(table, timeZone);
}
