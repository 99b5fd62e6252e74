import { FormatError } from "../errors.js";
import { ControlData, IsdRecord, MandatoryData, TemperatureObservation } from "../types.js";
import { decodeCode, decodeInteger, decodeScaled } from "./fieldCodec.js";

/** Length of the control and mandatory sections every record carries. */
export const FIXED_SECTION_LENGTH = 105;

const USAF_ID = /^\w{6}$/;
const WBAN_ID = /^\d{5}$/;
const DATETIME = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})$/;

/**
 * Parse the 12-character `YYYYMMDDHHMM` token as a UTC instant.
 * Out-of-range components are rejected, never rolled over.
 */
export function parseDateTime(token: string): Date {
  const match = token.match(DATETIME);
  if (!match) {
    throw new FormatError(`dt: "${token}" is not a YYYYMMDDHHMM timestamp`);
  }

  const [year, month, day, hour, minute] = match.slice(1).map((part) => parseInt(part, 10));
  const dt = new Date(Date.UTC(year, month - 1, day, hour, minute));

  if (
    dt.getUTCFullYear() !== year ||
    dt.getUTCMonth() !== month - 1 ||
    dt.getUTCDate() !== day ||
    dt.getUTCHours() !== hour ||
    dt.getUTCMinutes() !== minute
  ) {
    throw new FormatError(`dt: "${token}" is not a valid calendar date and time`);
  }
  return dt;
}

function temperature(raw: string, qualityCode: string, field: string): TemperatureObservation {
  const temperature_c = decodeScaled(raw, 10, field);
  return Object.freeze({
    temperature_c,
    temperature_f: temperature_c !== null ? temperature_c * 1.8 + 32 : null,
    quality_code: qualityCode,
  });
}

function parseControl(line: string): ControlData {
  const usaf_id = line.slice(4, 10);
  if (!USAF_ID.test(usaf_id)) {
    throw new FormatError(`usaf_id: "${usaf_id}" must be exactly 6 word characters`);
  }

  const wban_id = line.slice(10, 15);
  if (!WBAN_ID.test(wban_id)) {
    throw new FormatError(`wban_id: "${wban_id}" must be exactly 5 digits`);
  }

  const total_variable_characters = decodeInteger(line.slice(0, 4), "total_variable_characters");
  if (total_variable_characters === null) {
    throw new FormatError("total_variable_characters: value is required");
  }

  const qc_process_name = line.slice(56, 60).trim();
  if (qc_process_name.length > 4) {
    throw new FormatError(`qc_process_name: "${qc_process_name}" is longer than 4 characters`);
  }

  return Object.freeze({
    total_variable_characters,
    usaf_id,
    wban_id,
    dt: parseDateTime(line.slice(15, 27)),
    data_source_flag: decodeCode(line.slice(27, 28), 1, "data_source_flag"),
    latitude: decodeScaled(line.slice(28, 34), 1000, "latitude"),
    longitude: decodeScaled(line.slice(34, 41), 1000, "longitude"),
    report_type_code: decodeCode(line.slice(41, 46), 5, "report_type_code"),
    elevation: decodeInteger(line.slice(46, 51), "elevation"),
    call_letter_id: decodeCode(line.slice(51, 56), 5, "call_letter_id"),
    qc_process_name,
  });
}

function parseMandatory(line: string): MandatoryData {
  return Object.freeze({
    wind: Object.freeze({
      direction_angle: decodeInteger(line.slice(60, 63), "wind.direction_angle"),
      direction_quality_code: line[63],
      type_code: decodeCode(line[64], 1, "wind.type_code"),
      speed_rate: decodeScaled(line.slice(65, 69), 10, "wind.speed_rate"),
      speed_quality_code: line[69],
    }),
    ceiling: Object.freeze({
      ceiling_height: decodeInteger(line.slice(70, 75), "ceiling.ceiling_height"),
      ceiling_quality_code: line[75],
      ceiling_determination_code: decodeCode(line[76], 1, "ceiling.ceiling_determination_code"),
      cavok_code: decodeCode(line[77], 1, "ceiling.cavok_code"),
    }),
    visibility: Object.freeze({
      distance: decodeInteger(line.slice(78, 84), "visibility.distance"),
      distance_quality_code: line[84],
      variability_code: decodeCode(line[85], 1, "visibility.variability_code"),
      variability_quality_code: line[86],
    }),
    air_temperature: temperature(line.slice(87, 92), line[92], "air_temperature.temperature_c"),
    dew_point: temperature(line.slice(93, 98), line[98], "dew_point.temperature_c"),
    sea_level_pressure: Object.freeze({
      pressure: decodeScaled(line.slice(99, 104), 10, "sea_level_pressure.pressure"),
      quality_code: line[104],
    }),
  });
}

/**
 * Decode one ISD line. Only the fixed 105-character section is read; the
 * variable-length additional data that may follow is ignored.
 */
export function parseLine(line: string): IsdRecord {
  if (line.length < FIXED_SECTION_LENGTH) {
    throw new FormatError(`Record is ${line.length} characters long, expected at least ${FIXED_SECTION_LENGTH}`);
  }

  return Object.freeze({
    control: parseControl(line),
    mandatory: parseMandatory(line),
    additional: Object.freeze([]),
  });
}

/**
 * Decode every line of a file's text. Failures are re-raised with the source name
 * and the 1-based line number.
 */
export function parseLines(text: string, source = "<input>"): IsdRecord[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  return lines.map((line, i) => {
    try {
      return parseLine(line);
    } catch (err) {
      if (err instanceof FormatError) throw err.at(source, i + 1);
      throw err;
    }
  });
}
