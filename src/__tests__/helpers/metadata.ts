import { openMetadataDb } from "../../db.js";
import { NewFileCount, NewStation, StationRepository } from "../../stations.js";
import { DataQuality } from "../../types.js";

export const ERIE: NewStation = {
  usaf_id: "720534",
  wban_ids: "00161,00162",
  recent_wban_id: "00161",
  name: "ERIE MUNICIPAL AIRPORT",
  icao_code: "KEIK",
  latitude: 40.017,
  longitude: -105.05,
  elevation: 1563.6,
  state: "CO",
};

export function fileCount(
  station_id: number,
  wban_id: string,
  year: number,
  monthly = 700,
  quality: DataQuality = "high"
): NewFileCount {
  return {
    station_id,
    wban_id,
    year,
    jan: monthly,
    feb: monthly,
    mar: monthly,
    apr: monthly,
    may: monthly,
    jun: monthly,
    jul: monthly,
    aug: monthly,
    sep: monthly,
    oct: monthly,
    nov: monthly,
    dec: monthly,
    count: monthly * 12,
    n_zero_months: monthly === 0 ? 12 : 0,
    quality,
  };
}

/** An in-memory store holding the Erie station with inventory rows for the given years. */
export function seededRepo(years: number[] = []): { repo: StationRepository; stationId: number } {
  const repo = new StationRepository(openMetadataDb(":memory:"));
  const stationId = repo.upsertStation(ERIE);
  for (const year of years) repo.upsertFileCount(fileCount(stationId, "00161", year));
  return { repo, stationId };
}
