import dotenv from "dotenv";

dotenv.config();

export const config = {
  dbPath: process.env.DB_PATH || "data/metadata.db",
  noaaBaseUrl: process.env.NOAA_BASE_URL || "https://www.ncei.noaa.gov",
  httpTimeoutMs: Number(process.env.HTTP_TIMEOUT_MS ?? 15000),
  // Read data files from a local mirror instead of the NOAA server when set.
  mirrorDir: process.env.ISD_MIRROR_DIR || undefined,
  port: Number(process.env.PORT ?? 3000),
  // Guess a filename (and warn) for years missing from the inventory; "false" makes it an error.
  guessMissingFiles: (process.env.GUESS_MISSING_FILES ?? "true").toLowerCase() !== "false",
};
