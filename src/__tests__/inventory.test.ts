import { beforeEach, afterEach, describe, expect, it, vi } from "vitest";
import { openMetadataDb } from "../db.js";
import { FormatError } from "../errors.js";
import { gradeQuality, ingestInventory, ingestStationHistory, summarizeYear } from "../inventory.js";
import { StationRepository } from "../stations.js";
import { MonthToken } from "../types.js";

const HISTORY = [
  '"USAF","WBAN","STATION NAME","CTRY","STATE","ICAO","LAT","LON","ELEV(M)","BEGIN","END"',
  '"720534","00161","ERIE MUNI","US","CO","KEIK","+40.017","-105.050","+1563.6","20050101","20150101"',
  '"720534","00162","ERIE MUNICIPAL AIRPORT","US","CO","KEIK","+40.017","-105.050","+1563.6","20150101","20250101"',
  '"999999","00100","PLACEHOLDER","US","CO","","+40.000","-105.000","+1000.0","20000101","20250101"',
  '"123456","99999","ABROAD","FR","","","+48.000","+2.000","+50.0","20000101","20250101"',
  '"654321","99999","NOWHERE","US","TX","","+0.000","+0.000","+0.0","20000101","20250101"',
].join("\n");

const MONTH_HEADER = '"JAN","FEB","MAR","APR","MAY","JUN","JUL","AUG","SEP","OCT","NOV","DEC"';

function inventoryRow(usaf: string, wban: string, year: number, months: number[]): string {
  return [usaf, wban, year, ...months].map((v) => `"${v}"`).join(",");
}

const uniform = (value: number): Record<MonthToken, number> => ({
  jan: value,
  feb: value,
  mar: value,
  apr: value,
  may: value,
  jun: value,
  jul: value,
  aug: value,
  sep: value,
  oct: value,
  nov: value,
  dec: value,
});

describe("ingestStationHistory", () => {
  let repo: StationRepository;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    repo = new StationRepository(openMetadataDb(":memory:"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps the most recent row per station and every WBAN id", () => {
    expect(ingestStationHistory(repo, HISTORY)).toBe(1);
    expect(repo.findStation("720534")).toMatchObject({
      usaf_id: "720534",
      wban_ids: "00161,00162",
      recent_wban_id: "00162",
      name: "ERIE MUNICIPAL AIRPORT",
      icao_code: "KEIK",
      latitude: 40.017,
      longitude: -105.05,
      elevation: 1563.6,
      state: "CO",
    });
  });

  it("rejects rows that do not match the header", () => {
    const broken = '"USAF","WBAN"\n"720534","00161","extra"\n';
    expect(() => ingestStationHistory(repo, broken)).toThrow(FormatError);
    expect(() => ingestStationHistory(repo, broken)).toThrow(/^Could not read station history: /);
    expect(repo.usafIds()).toEqual([]);
  });

  it("skips placeholder, foreign and unlocated stations", () => {
    ingestStationHistory(repo, HISTORY);
    expect(repo.usafIds()).toEqual(["720534"]);
  });

  it("loads inventory rows for known stations from 2005 on", () => {
    ingestStationHistory(repo, HISTORY);
    const csv = [
      `"USAF","WBAN","YEAR",${MONTH_HEADER}`,
      inventoryRow("720534", "00162", 2004, new Array(12).fill(700)),
      inventoryRow("720534", "00162", 2023, new Array(12).fill(800)),
      inventoryRow("720534", "00162", 2024, [700, 0, 700, 700, 700, 700, 700, 700, 700, 700, 700, 700]),
      inventoryRow("111111", "00001", 2023, new Array(12).fill(800)),
    ].join("\n");

    expect(ingestInventory(repo, csv, new Date(Date.UTC(2025, 2, 15)))).toBe(2);

    const station = repo.findStation("720534");
    expect(station).toBeDefined();
    const rows = repo.fileCounts(station?.id ?? -1);
    expect(rows.map((row) => row.year)).toEqual([2023, 2024]);
    expect(rows[0]).toMatchObject({ wban_id: "00162", jan: 800, dec: 800, count: 9600, n_zero_months: 0, quality: "high" });
    expect(rows[1]).toMatchObject({ feb: 0, count: 7700, n_zero_months: 1, quality: "medium" });
  });
});

describe("gradeQuality", () => {
  it("grades by coverage and empty months", () => {
    expect(gradeQuality(900, 1000, 0)).toBe("high");
    expect(gradeQuality(900, 1000, 1)).toBe("medium");
    expect(gradeQuality(500, 1000, 2)).toBe("medium");
    expect(gradeQuality(500, 1000, 3)).toBe("low");
    expect(gradeQuality(499, 1000, 0)).toBe("low");
  });
});

describe("summarizeYear", () => {
  it("counts every hour of a finished year", () => {
    expect(summarizeYear(2023, uniform(730), new Date(Date.UTC(2025, 0, 1)))).toEqual({
      count: 8760,
      hours: 8760,
      n_zero_months: 0,
      quality: "high",
    });
  });

  it("counts only elapsed hours of the current year", () => {
    const counts = { ...uniform(0), jan: 700, feb: 600, mar: 0 };
    expect(summarizeYear(2025, counts, new Date(Date.UTC(2025, 2, 15, 12)))).toEqual({
      count: 1300,
      hours: 744 + 672 + 336,
      n_zero_months: 1,
      quality: "medium",
    });
  });

  it("returns null for a year that has not started", () => {
    expect(summarizeYear(2026, uniform(0), new Date(Date.UTC(2025, 5, 1)))).toBe(null);
  });
});
