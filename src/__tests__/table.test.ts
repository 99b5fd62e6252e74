import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { parseLine } from "../isd/parser.js";
import {
  convertTimeZone,
  formatTimestamp,
  pickColumns,
  recordsToTable,
  resolveColumns,
  tableToRows,
  validateTimeZone,
} from "../table.js";
import { CONTROL_FIELDS } from "../types.js";
import { isdLine } from "./helpers/isdLine.js";

describe("resolveColumns", () => {
  it("selects every mandatory field by default", () => {
    const columns = resolveColumns();
    expect(columns).toHaveLength(21);
    expect(columns[0]).toBe("wind.direction_angle");
    expect(columns[columns.length - 1]).toBe("sea_level_pressure.quality_code");
  });

  it("drops quality codes on request", () => {
    expect(resolveColumns({ datum: "air_temperature", includeQualityCodes: false })).toEqual([
      "air_temperature.temperature_c",
      "air_temperature.temperature_f",
    ]);
  });

  it("filters temperatures by scale", () => {
    expect(resolveColumns({ datum: ["air_temperature", "dew_point"], tempScale: "f" })).toEqual([
      "air_temperature.temperature_f",
      "air_temperature.quality_code",
      "dew_point.temperature_f",
      "dew_point.quality_code",
    ]);
  });

  it("puts control fields first when asked", () => {
    const columns = resolveColumns({ datum: "sea_level_pressure", includeControl: true });
    expect(columns).toEqual([...CONTROL_FIELDS, "sea_level_pressure.pressure", "sea_level_pressure.quality_code"]);
  });

  it("lets include and exclude take precedence over datum", () => {
    expect(resolveColumns({ datum: ["ceiling"], include: { wind: ["speed_rate"] } })).toEqual(["wind.speed_rate"]);
    expect(resolveColumns({ datum: ["ceiling"], exclude: { wind: true, ceiling: true, visibility: true } })).toEqual([
      "air_temperature.temperature_c",
      "air_temperature.temperature_f",
      "air_temperature.quality_code",
      "dew_point.temperature_c",
      "dew_point.temperature_f",
      "dew_point.quality_code",
      "sea_level_pressure.pressure",
      "sea_level_pressure.quality_code",
    ]);
  });

  it("rejects unknown groups, fields and scales", () => {
    expect(() => resolveColumns({ datum: "humidity" })).toThrow(ConfigurationError);
    expect(() => resolveColumns({ include: { wind: ["gusts"] } })).toThrow('include: "wind" has no field "gusts"');
    expect(() => resolveColumns({ exclude: { rain: true } })).toThrow(/exclude: unknown group "rain"/);
    expect(() => resolveColumns({ tempScale: "K" })).toThrow('Temperature scale must be "C" or "F", not "K"');
  });
});

describe("recordsToTable", () => {
  const records = [isdLine(), isdLine({ dt: "202501010115", temperature: "+0020" })].map(parseLine);

  it("indexes by observation time with one column per field", () => {
    const table = recordsToTable(records, ["usaf_id", "air_temperature.temperature_c", "ceiling.cavok_code"]);
    expect(table.index).toEqual([Date.UTC(2025, 0, 1, 0, 15), Date.UTC(2025, 0, 1, 1, 15)]);
    expect(table.columns).toEqual({
      usaf_id: ["720534", "720534"],
      "air_temperature.temperature_c": [-1.5, 2],
      "ceiling.cavok_code": ["N", "N"],
    });
    expect(table.timeZone).toBe("UTC");
  });

  it("keeps only the named columns", () => {
    const table = recordsToTable(records, ["usaf_id", "wind.speed_rate"]);
    expect(Object.keys(pickColumns(table, ["wind.speed_rate", "visibility.distance"]).columns)).toEqual([
      "wind.speed_rate",
    ]);
  });
});

describe("time zones", () => {
  const midnight = Date.UTC(2025, 0, 1);

  it("formats UTC with a Z suffix", () => {
    expect(formatTimestamp(midnight, "UTC")).toBe("2025-01-01T00:00:00Z");
  });

  it("formats other zones with their offset at that instant", () => {
    expect(formatTimestamp(midnight, "America/Denver")).toBe("2024-12-31T17:00:00-07:00");
    expect(formatTimestamp(Date.UTC(2025, 6, 1), "America/Denver")).toBe("2025-06-30T18:00:00-06:00");
  });

  it("changes only the display zone", () => {
    const table = { index: [midnight], columns: { x: [1] }, timeZone: "UTC" };
    const converted = convertTimeZone(table, "Asia/Tokyo");
    expect(converted.index).toEqual([midnight]);
    expect(tableToRows(converted)).toEqual([{ timestamp: "2025-01-01T09:00:00+09:00", x: 1 }]);
  });

  it("rejects unknown zones", () => {
    expect(() => validateTimeZone("Mars/Olympus_Mons")).toThrow(ConfigurationError);
  });
});
