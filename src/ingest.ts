import fs from "fs";
import { config } from "./config.js";
import { openMetadataDb } from "./db.js";
import { ingestInventory, ingestStationHistory } from "./inventory.js";
import { StationRepository } from "./stations.js";

// Usage: node dist/ingest.js <isd-history.csv> [isd-inventory.csv]
const [historyPath, inventoryPath] = process.argv.slice(2);
if (!historyPath) {
  console.error("Usage: ingest <isd-history.csv> [isd-inventory.csv]");
  process.exit(1);
}

const db = openMetadataDb(config.dbPath);
try {
  const repo = new StationRepository(db);
  ingestStationHistory(repo, fs.readFileSync(historyPath, "utf8"));
  if (inventoryPath) ingestInventory(repo, fs.readFileSync(inventoryPath, "utf8"));
} finally {
  db.close();
}
