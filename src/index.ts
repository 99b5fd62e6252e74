import { createServer } from "http";
import { createApp } from "./api.js";
import { config } from "./config.js";
import { openMetadataDb } from "./db.js";
import { StationRepository } from "./stations.js";
import { DirectoryTransport, HttpTransport, Transport } from "./transport.js";

const db = openMetadataDb(config.dbPath);
const repo = new StationRepository(db);

const transport: Transport = config.mirrorDir
  ? new DirectoryTransport(config.mirrorDir)
  : new HttpTransport(config.noaaBaseUrl, config.httpTimeoutMs);

const app = createApp({ repo, transport, guessMissingFiles: config.guessMissingFiles });
const server = createServer(app);

const source = config.mirrorDir ? `mirror at ${config.mirrorDir}` : config.noaaBaseUrl;
server.listen(config.port, () => console.log(`Server listening on :${config.port} - reading ISD files from ${source}`));
