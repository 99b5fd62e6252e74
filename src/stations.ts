import type Database from "better-sqlite3";
import { MetadataDb } from "./db.js";
import { ConfigurationError, UnknownStationError } from "./errors.js";
import { FileCountRow, MONTHS, StationRow } from "./types.js";

export type NewStation = Omit<StationRow, "id">;
export type NewFileCount = Omit<FileCountRow, "id">;

export type QualityReportRow = NewFileCount & { usaf_id: string };

const STATION_COLUMNS = "id, usaf_id, wban_ids, recent_wban_id, name, icao_code, latitude, longitude, elevation, state";
const FILECOUNT_COLUMNS = `id, station_id, wban_id, year, ${MONTHS.join(", ")}, count, n_zero_months, quality`;

/**
 * Queries against the metadata database. The database handle is passed in, so each
 * caller decides how long it lives.
 */
export class StationRepository {
  private readonly selectStation: Database.Statement<[string], StationRow>;
  private readonly selectFileCounts: Database.Statement<[number], FileCountRow>;
  private readonly selectFileCountsForYear: Database.Statement<[number, number], FileCountRow>;
  private readonly selectUsafIds: Database.Statement<[], { usaf_id: string }>;
  private readonly upsertStationStmt: Database.Statement<[NewStation], { id: number }>;
  private readonly upsertFileCountStmt: Database.Statement<[NewFileCount]>;

  constructor(private readonly db: MetadataDb) {
    this.selectStation = db.prepare<[string], StationRow>(`SELECT ${STATION_COLUMNS} FROM station WHERE usaf_id = ?`);
    this.selectFileCounts = db.prepare<[number], FileCountRow>(
      `SELECT ${FILECOUNT_COLUMNS} FROM filecount WHERE station_id = ? ORDER BY year, wban_id`
    );
    this.selectFileCountsForYear = db.prepare<[number, number], FileCountRow>(
      `SELECT ${FILECOUNT_COLUMNS} FROM filecount WHERE station_id = ? AND year = ? ORDER BY wban_id`
    );
    this.selectUsafIds = db.prepare<[], { usaf_id: string }>("SELECT usaf_id FROM station ORDER BY usaf_id");
    this.upsertStationStmt = db.prepare<NewStation, { id: number }>(`
      INSERT INTO station (usaf_id, wban_ids, recent_wban_id, name, icao_code, latitude, longitude, elevation, state)
      VALUES (@usaf_id, @wban_ids, @recent_wban_id, @name, @icao_code, @latitude, @longitude, @elevation, @state)
      ON CONFLICT(usaf_id) DO UPDATE SET
        wban_ids = excluded.wban_ids,
        recent_wban_id = excluded.recent_wban_id,
        name = excluded.name,
        icao_code = excluded.icao_code,
        latitude = excluded.latitude,
        longitude = excluded.longitude,
        elevation = excluded.elevation,
        state = excluded.state
      RETURNING id
    `);
    this.upsertFileCountStmt = db.prepare<NewFileCount>(`
      INSERT OR REPLACE INTO filecount (station_id, wban_id, year, ${MONTHS.join(", ")}, count, n_zero_months, quality)
      VALUES (@station_id, @wban_id, @year, ${MONTHS.map((m) => `@${m}`).join(", ")}, @count, @n_zero_months, @quality)
    `);
  }

  findStation(usafId: string): StationRow | undefined {
    return this.selectStation.get(usafId);
  }

  fileCounts(stationId: number, year?: number): FileCountRow[] {
    return year === undefined
      ? this.selectFileCounts.all(stationId)
      : this.selectFileCountsForYear.all(stationId, year);
  }

  usafIds(): string[] {
    return this.selectUsafIds.all().map((row) => row.usaf_id);
  }

  /** Insert or update a station; returns its row id. */
  upsertStation(station: NewStation): number {
    const row = this.upsertStationStmt.get(station);
    if (!row) throw new Error(`Station ${station.usaf_id} was not written`);
    return row.id;
  }

  upsertFileCount(fileCount: NewFileCount): void {
    this.upsertFileCountStmt.run(fileCount);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}

export interface StationOptions {
  /**
   * When a requested year has no inventory row, guess a filename from the most recent
   * WBAN id (with a warning) instead of failing. Defaults to true.
   */
  guessMissingFiles?: boolean;
}

const FILENAME_TEMPLATE = (usafId: string, wbanId: string, year: number) =>
  `/pub/data/noaa/${year}/${usafId}-${wbanId}-${year}.gz`;

/**
 * A weather station from the metadata store.
 *
 * @example
 *   const station = Station.load(repo, "720534");
 *   station.getFilenames(2022); // ["/pub/data/noaa/2022/720534-00161-2022.gz"]
 */
export class Station {
  private constructor(
    private readonly repo: StationRepository,
    private readonly row: StationRow,
    private readonly guessMissingFiles: boolean
  ) {}

  static load(repo: StationRepository, usafId: string, options: StationOptions = {}): Station {
    const row = repo.findStation(usafId);
    if (!row) throw new UnknownStationError(usafId);
    return new Station(repo, row, options.guessMissingFiles ?? true);
  }

  get usafId(): string {
    return this.row.usaf_id;
  }

  get name(): string | null {
    return this.row.name;
  }

  /** Every WBAN id ever paired with this station. */
  get wbanIds(): string[] {
    return this.row.wban_ids.split(",").filter((id) => id !== "");
  }

  get recentWbanId(): string {
    return this.row.recent_wban_id;
  }

  get icaoCode(): string | null {
    return this.row.icao_code;
  }

  get latitude(): number | null {
    return this.row.latitude;
  }

  get longitude(): number | null {
    return this.row.longitude;
  }

  get elevation(): number | null {
    return this.row.elevation;
  }

  get state(): string | null {
    return this.row.state;
  }

  /** Years with a file inventory entry. */
  get years(): number[] {
    return [...new Set(this.repo.fileCounts(this.row.id).map((row) => row.year))];
  }

  /**
   * Data file paths for this station, for one year or for every year on record.
   * A year missing from the inventory yields a single guessed path built from the
   * most recent WBAN id, and a warning that the file may not exist.
   */
  getFilenames(year?: number): string[] {
    const filenames = this.repo
      .fileCounts(this.row.id, year)
      .map((row) => FILENAME_TEMPLATE(this.row.usaf_id, row.wban_id, row.year));
    if (filenames.length > 0 || year === undefined) return filenames;

    const guess = FILENAME_TEMPLATE(this.row.usaf_id, this.row.recent_wban_id, year);
    if (!this.guessMissingFiles) {
      throw new ConfigurationError(`No file inventory for station ${this.row.usaf_id} and year ${year}`);
    }
    console.warn(
      `A record for station ${this.row.usaf_id} and year ${year} was not found in the metadata store. ` +
        `Trying to fetch data directly from the following path, which may not exist: ${guess}`
    );
    return [guess];
  }

  qualityReport(year?: number): QualityReportRow[] {
    return this.repo.fileCounts(this.row.id, year).map(({ id: _id, ...row }) => ({
      usaf_id: this.row.usaf_id,
      ...row,
    }));
  }

  toJSON() {
    return {
      usafId: this.usafId,
      name: this.name,
      wbanIds: this.wbanIds,
      recentWbanId: this.recentWbanId,
      icaoCode: this.icaoCode,
      latitude: this.latitude,
      longitude: this.longitude,
      elevation: this.elevation,
      state: this.state,
      years: this.years,
    };
  }
}
