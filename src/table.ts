import { TZDate } from "@date-fns/tz";
import { formatISO } from "date-fns";
import { ConfigurationError } from "./errors.js";
import {
  CellValue,
  CONTROL_FIELDS,
  GROUP_FIELDS,
  IsdRecord,
  MANDATORY_GROUPS,
  MandatoryGroup,
  TimeSeriesTable,
} from "./types.js";

/** Per group, either the whole group or a list of its fields. */
export type FieldSelection = Partial<Record<string, true | readonly string[]>>;

export interface ColumnOptions {
  /** Observation groups to include; all groups when omitted. */
  datum?: string | readonly string[];
  /** Fine-grained selection; takes precedence over `datum`. */
  include?: FieldSelection;
  /** Fields removed after `include`/`datum` are applied; takes precedence over `datum`. */
  exclude?: FieldSelection;
  includeControl?: boolean;
  includeQualityCodes?: boolean;
  /** Keep only Celsius ("C") or Fahrenheit ("F") temperature columns. */
  tempScale?: string;
}

/** Columns that carry a measurement and can be averaged over a period. */
export const AGGREGABLE_COLUMNS: readonly string[] = [
  "wind.speed_rate",
  "ceiling.ceiling_height",
  "visibility.distance",
  "air_temperature.temperature_c",
  "air_temperature.temperature_f",
  "dew_point.temperature_c",
  "dew_point.temperature_f",
  "sea_level_pressure.pressure",
];

function isGroup(name: string): name is MandatoryGroup {
  return MANDATORY_GROUPS.some((group) => group === name);
}

function validateSelection(selection: FieldSelection, label: string): void {
  for (const [group, fields] of Object.entries(selection)) {
    if (!isGroup(group)) {
      throw new ConfigurationError(`${label}: unknown group "${group}"; expected one of ${MANDATORY_GROUPS.join(", ")}`);
    }
    if (fields === undefined || fields === true) continue;
    const known: readonly string[] = GROUP_FIELDS[group];
    for (const field of fields) {
      if (!known.includes(field)) {
        throw new ConfigurationError(`${label}: "${group}" has no field "${field}"`);
      }
    }
  }
}

function selects(selection: FieldSelection | undefined, group: string, field: string): boolean {
  const fields = selection?.[group];
  if (fields === undefined) return false;
  return fields === true || fields.includes(field);
}

/**
 * Check every column option and return the column names they select, in record order.
 * Nothing is read; callers run this before any I/O.
 */
export function resolveColumns(options: ColumnOptions = {}): string[] {
  const { include, exclude, includeControl = false, includeQualityCodes = true, tempScale } = options;

  const datum = options.datum === undefined ? undefined : typeof options.datum === "string" ? [options.datum] : options.datum;
  if (datum) {
    for (const group of datum) {
      if (!isGroup(group)) {
        throw new ConfigurationError(`datum must be a subset of the following: ${MANDATORY_GROUPS.join(", ")}`);
      }
    }
  }
  if (include) validateSelection(include, "include");
  if (exclude) validateSelection(exclude, "exclude");

  const scale = tempScale?.toUpperCase();
  if (scale !== undefined && scale !== "C" && scale !== "F") {
    throw new ConfigurationError(`Temperature scale must be "C" or "F", not "${tempScale}"`);
  }

  const columns: string[] = includeControl ? [...CONTROL_FIELDS] : [];
  const fineGrained = include !== undefined || exclude !== undefined;

  for (const group of MANDATORY_GROUPS) {
    for (const field of GROUP_FIELDS[group]) {
      if (include !== undefined) {
        if (!selects(include, group, field)) continue;
      } else if (!fineGrained && datum && !datum.includes(group)) {
        continue;
      }
      if (selects(exclude, group, field)) continue;
      columns.push(`${group}.${field}`);
    }
  }

  return columns.filter((name) => {
    if (!includeQualityCodes && name.includes("quality_code")) return false;
    if (scale === "C" && name.includes("temperature_f")) return false;
    if (scale === "F" && name.includes("temperature_c")) return false;
    return true;
  });
}

function cell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string") return value;
  return String(value);
}

function readColumn(record: IsdRecord, column: string): CellValue {
  const dot = column.indexOf(".");
  if (dot === -1) return cell(Reflect.get(record.control, column));
  const group = column.slice(0, dot);
  if (!isGroup(group)) return null;
  return cell(Reflect.get(record.mandatory[group], column.slice(dot + 1)));
}

/** Flatten records into a UTC table indexed by observation time, one column per selected field. */
export function recordsToTable(records: readonly IsdRecord[], columns: readonly string[]): TimeSeriesTable {
  const table: TimeSeriesTable = {
    index: records.map((record) => record.control.dt.getTime()),
    columns: {},
    timeZone: "UTC",
  };
  for (const column of columns) {
    table.columns[column] = records.map((record) => readColumn(record, column));
  }
  return table;
}

/** Keep only the named columns that are present. */
export function pickColumns(table: TimeSeriesTable, names: readonly string[]): TimeSeriesTable {
  const columns: TimeSeriesTable["columns"] = {};
  for (const [name, values] of Object.entries(table.columns)) {
    if (names.includes(name)) columns[name] = values;
  }
  return { ...table, columns };
}

export function validateTimeZone(timeZone: string): string {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch (err) {
    throw new ConfigurationError(`Unknown time zone "${timeZone}": ${err instanceof Error ? err.message : String(err)}`);
  }
  return timeZone;
}

/** Render in another zone. Instants and bin boundaries are untouched. */
export function convertTimeZone(table: TimeSeriesTable, timeZone: string): TimeSeriesTable {
  return { ...table, timeZone: validateTimeZone(timeZone) };
}

/** ISO 8601 timestamp with the offset of `timeZone` at that instant ("Z" for UTC). */
export function formatTimestamp(ms: number, timeZone: string): string {
  return formatISO(new TZDate(ms, timeZone));
}

export type TableRow = { timestamp: string } & Record<string, CellValue>;

export function tableToRows(table: TimeSeriesTable): TableRow[] {
  const names = Object.keys(table.columns);
  return table.index.map((ms, i) => {
    const row: TableRow = { timestamp: formatTimestamp(ms, table.timeZone) };
    for (const name of names) row[name] = table.columns[name][i];
    return row;
  });
}
