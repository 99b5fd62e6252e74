import { TZDate } from "@date-fns/tz";
import { parse } from "csv-parse/sync";
import { getDaysInMonth, startOfDay } from "date-fns";
import { FormatError } from "./errors.js";
import { NewStation, StationRepository } from "./stations.js";
import { DataQuality, MONTHS, MonthToken } from "./types.js";

/** Inventory years before this are not loaded. */
export const MIN_INVENTORY_YEAR = 2005;

const HOUR_MS = 3600_000;

// Explicit month order for the inventory's jan..dec columns.
const MONTH_NUMBER: Record<MonthToken, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

function monthRecord<T>(value: (token: MonthToken) => T): Record<MonthToken, T> {
  return {
    jan: value("jan"),
    feb: value("feb"),
    mar: value("mar"),
    apr: value("apr"),
    may: value("may"),
    jun: value("jun"),
    jul: value("jul"),
    aug: value("aug"),
    sep: value("sep"),
    oct: value("oct"),
    nov: value("nov"),
    dec: value("dec"),
  };
}

function coordinate(raw: string | undefined): number | null {
  if (!raw) return null;
  const value = Number(raw.replace(/^\+/, ""));
  // the history file uses 0 for unknown coordinates and elevations
  return Number.isFinite(value) && value !== 0 ? value : null;
}

const orNull = (value: string | undefined) => (value ? value : null);

type CsvRow = Record<string, string>;

function isCsvRow(row: unknown): row is CsvRow {
  return typeof row === "object" && row !== null && Object.values(row).every((value) => typeof value === "string");
}

/** Rows of a CSV file with a header line, keyed by column name. */
function readCsv(csvText: string, label: string, lowercaseHeaders = false): CsvRow[] {
  let rows: unknown;
  try {
    rows = parse(csvText, {
      columns: lowercaseHeaders ? (header: string[]) => header.map((name) => name.toLowerCase()) : true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    throw new FormatError(`Could not read ${label}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return Array.isArray(rows) ? rows.filter(isCsvRow) : [];
}

/**
 * Load NOAA's station history CSV (isd-history.csv). For each USAF id the most
 * recent row wins and every WBAN id it was paired with is kept. Only US stations
 * with coordinates are stored. Returns the number of stations written.
 */
export function ingestStationHistory(repo: StationRepository, csvText: string): number {
  const latest = new Map<string, CsvRow>();
  const wbans = new Map<string, string[]>();

  for (const row of readCsv(csvText, "station history")) {
    const usaf = row["USAF"];
    const seen = wbans.get(usaf) ?? [];
    if (!seen.includes(row["WBAN"])) seen.push(row["WBAN"]);
    wbans.set(usaf, seen);

    const current = latest.get(usaf);
    if (!current || row["END"] > current["END"]) latest.set(usaf, row);
  }

  const stations: NewStation[] = [];
  for (const [usaf, row] of latest) {
    const latitude = coordinate(row["LAT"]);
    const longitude = coordinate(row["LON"]);
    if (usaf === "999999" || row["CTRY"] !== "US" || latitude === null || longitude === null) continue;

    stations.push({
      usaf_id: usaf,
      wban_ids: (wbans.get(usaf) ?? []).join(","),
      recent_wban_id: row["WBAN"],
      name: orNull(row["STATION NAME"]),
      icao_code: orNull(row["ICAO"]),
      latitude,
      longitude,
      elevation: coordinate(row["ELEV(M)"]),
      state: orNull(row["STATE"]),
    });
  }

  repo.transaction(() => {
    for (const station of stations) repo.upsertStation(station);
  });
  console.log(`Loaded ${stations.length} stations from station history`);
  return stations.length;
}

export function gradeQuality(count: number, hours: number, zeroMonths: number): DataQuality {
  if (count >= 0.9 * hours && zeroMonths === 0) return "high";
  if (count >= 0.5 * hours && zeroMonths <= 2) return "medium";
  return "low";
}

export interface YearSummary {
  count: number;
  hours: number;
  n_zero_months: number;
  quality: DataQuality;
}

/**
 * Summarize one station-year of monthly observation counts. Months that start
 * after `today` are ignored; the current month counts the hours elapsed so far.
 * Returns null when no month of the year has started.
 */
export function summarizeYear(
  year: number,
  counts: Record<MonthToken, number>,
  today: Date = new Date()
): YearSummary | null {
  const todayStart = startOfDay(new TZDate(today.getTime(), "UTC"));
  let count = 0;
  let hours = 0;
  let zeroMonths = 0;
  let months = 0;

  for (const token of MONTHS) {
    const monthStart = new TZDate(year, MONTH_NUMBER[token] - 1, 1, "UTC");
    if (monthStart.getTime() > todayStart.getTime()) continue;

    const isCurrentMonth =
      todayStart.getFullYear() === year && todayStart.getMonth() === MONTH_NUMBER[token] - 1;
    hours += isCurrentMonth
      ? (todayStart.getTime() - monthStart.getTime()) / HOUR_MS
      : getDaysInMonth(monthStart) * 24;
    count += counts[token];
    if (counts[token] === 0) zeroMonths += 1;
    months += 1;
  }

  if (months === 0) return null;
  return { count, hours, n_zero_months: zeroMonths, quality: gradeQuality(count, hours, zeroMonths) };
}

/**
 * Load NOAA's file inventory CSV (isd-inventory.csv) for stations already in the
 * store, from `MIN_INVENTORY_YEAR` on. Returns the number of station-years written.
 */
export function ingestInventory(repo: StationRepository, csvText: string, today: Date = new Date()): number {
  let written = 0;

  repo.transaction(() => {
    for (const row of readCsv(csvText, "file inventory", true)) {
      const year = parseInt(row["year"], 10);
      if (!Number.isFinite(year) || year < MIN_INVENTORY_YEAR) continue;

      const station = repo.findStation(row["usaf"]);
      if (!station) continue;

      const counts = monthRecord((token) => parseInt(row[token] ?? "0", 10) || 0);

      const summary = summarizeYear(year, counts, today);
      if (!summary) continue;

      repo.upsertFileCount({
        station_id: station.id,
        wban_id: row["wban"],
        year,
        ...counts,
        count: summary.count,
        n_zero_months: summary.n_zero_months,
        quality: summary.quality,
      });
      written += 1;
    }
  });

  console.log(`Loaded ${written} station-years from file inventory`);
  return written;
}
