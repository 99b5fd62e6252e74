/** Control data section of an ISD record: station, time and report metadata. */
export interface ControlData {
  readonly total_variable_characters: number; // length of the variable section; record length is 105 + this
  readonly usaf_id: string;
  readonly wban_id: string;
  readonly dt: Date; // UTC
  readonly data_source_flag: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly report_type_code: string | null;
  readonly elevation: number | null; // meters
  readonly call_letter_id: string | null;
  readonly qc_process_name: string;
}

export interface WindObservation {
  readonly direction_angle: number | null; // degrees clockwise from true north
  readonly direction_quality_code: string;
  readonly type_code: string | null;
  readonly speed_rate: number | null; // m/s
  readonly speed_quality_code: string;
}

/** Ceiling height 22000 means "unlimited" and is a reported value. */
export interface SkyConditionObservation {
  readonly ceiling_height: number | null; // meters AGL
  readonly ceiling_quality_code: string;
  readonly ceiling_determination_code: string | null;
  readonly cavok_code: string | null; // "N" | "Y"
}

export interface VisibilityObservation {
  readonly distance: number | null; // meters, capped at 160000
  readonly distance_quality_code: string;
  readonly variability_code: string | null; // "N" | "V"
  readonly variability_quality_code: string;
}

/** Used for both the air temperature and the dew point. */
export interface TemperatureObservation {
  readonly temperature_c: number | null;
  readonly temperature_f: number | null;
  readonly quality_code: string;
}

export interface PressureObservation {
  readonly pressure: number | null; // hectopascals
  readonly quality_code: string;
}

export interface MandatoryData {
  readonly wind: WindObservation;
  readonly ceiling: SkyConditionObservation;
  readonly visibility: VisibilityObservation;
  readonly air_temperature: TemperatureObservation;
  readonly dew_point: TemperatureObservation;
  readonly sea_level_pressure: PressureObservation;
}

export type MandatoryGroup = keyof MandatoryData;

export const MANDATORY_GROUPS: readonly MandatoryGroup[] = [
  "wind",
  "ceiling",
  "visibility",
  "air_temperature",
  "dew_point",
  "sea_level_pressure",
];

/** Fields of each group, in column order. */
export const GROUP_FIELDS: { readonly [G in MandatoryGroup]: readonly (keyof MandatoryData[G])[] } = {
  wind: ["direction_angle", "direction_quality_code", "type_code", "speed_rate", "speed_quality_code"],
  ceiling: ["ceiling_height", "ceiling_quality_code", "ceiling_determination_code", "cavok_code"],
  visibility: ["distance", "distance_quality_code", "variability_code", "variability_quality_code"],
  air_temperature: ["temperature_c", "temperature_f", "quality_code"],
  dew_point: ["temperature_c", "temperature_f", "quality_code"],
  sea_level_pressure: ["pressure", "quality_code"],
};

export const CONTROL_FIELDS: readonly Exclude<keyof ControlData, "dt">[] = [
  "total_variable_characters",
  "usaf_id",
  "wban_id",
  "data_source_flag",
  "latitude",
  "longitude",
  "report_type_code",
  "elevation",
  "call_letter_id",
  "qc_process_name",
];

/** Additional-data groups are not decoded; the list is always empty. */
export type AdditionalData = never;

export interface IsdRecord {
  readonly control: ControlData;
  readonly mandatory: MandatoryData;
  readonly additional: readonly AdditionalData[];
}

export type CellValue = number | string | null;

/**
 * Column-oriented time series. `index` holds epoch milliseconds (UTC); `timeZone`
 * only affects how timestamps are rendered.
 */
export interface TimeSeriesTable {
  index: number[];
  columns: Record<string, CellValue[]>;
  timeZone: string;
}

export type RollupPolicy = "starting" | "ending" | "midpoint" | "instant";

export const ROLLUP_POLICIES: readonly RollupPolicy[] = ["starting", "ending", "midpoint", "instant"];

/** Station catalog row, as stored in the metadata database */
export type StationRow = {
  id: number;
  usaf_id: string;
  wban_ids: string; // comma separated
  recent_wban_id: string;
  name: string | null;
  icao_code: string | null;
  latitude: number | null;
  longitude: number | null;
  elevation: number | null;
  state: string | null;
};

export type DataQuality = "low" | "medium" | "high";

export const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"] as const;

export type MonthToken = (typeof MONTHS)[number];

/** Per station-year file inventory row */
export type FileCountRow = {
  id: number;
  station_id: number;
  wban_id: string;
  year: number;
  count: number | null;
  n_zero_months: number | null;
  quality: DataQuality | null;
} & Record<MonthToken, number | null>;
