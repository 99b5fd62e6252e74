import express, { NextFunction, Request, Response, Router } from "express";

import { ConfigurationError, FormatError, TransportError, UnknownStationError } from "./errors.js";
import { fetchTable } from "./fetch.js";
import { Station, StationRepository } from "./stations.js";
import { tableToRows } from "./table.js";
import { Transport } from "./transport.js";

export interface ApiDeps {
  repo: StationRepository;
  transport: Transport;
  guessMissingFiles?: boolean;
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

// express 4 does not forward rejected promises to the error handler on its own
const handle = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve()
    .then(() => fn(req, res))
    .catch(next);
};

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ConfigurationError(`Query parameter "${name}" must be given once`);
  return value;
}

function queryBoolean(req: Request, name: string): boolean | undefined {
  const value = queryString(req, name)?.toLowerCase();
  if (value === undefined) return undefined;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new ConfigurationError(`Query parameter "${name}" must be true or false, not "${value}"`);
}

function queryList(req: Request, name: string): string[] | undefined {
  const value = queryString(req, name);
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function parseYear(raw: string): number {
  if (!/^\d{4}$/.test(raw)) throw new ConfigurationError(`Invalid year "${raw}"`);
  return Number(raw);
}

function queryYear(req: Request): number | undefined {
  const raw = queryString(req, "year");
  return raw === undefined ? undefined : parseYear(raw);
}

/** Status code for an error raised while serving a request. */
export function errorStatus(err: unknown): number {
  if (err instanceof UnknownStationError) return 404;
  if (err instanceof ConfigurationError) return 400;
  if (err instanceof FormatError) return 422;
  if (err instanceof TransportError) return 502;
  return 500;
}

export function createApi({ repo, transport, guessMissingFiles = true }: ApiDeps): Router {
  const router = Router();
  const load = (req: Request) => Station.load(repo, req.params.usafId, { guessMissingFiles });

  router.get("/stations", (_req, res) => {
    res.json(repo.usafIds());
  });

  router.get(
    "/stations/:usafId",
    handle((req, res) => {
      res.json(load(req));
    })
  );

  router.get(
    "/stations/:usafId/files",
    handle((req, res) => {
      res.json({ filenames: load(req).getFilenames(queryYear(req)) });
    })
  );

  router.get(
    "/stations/:usafId/quality",
    handle((req, res) => {
      res.json(load(req).qualityReport(queryYear(req)));
    })
  );

  router.get(
    "/stations/:usafId/data",
    handle(async (req, res) => {
      const station = load(req);
      const years = queryList(req, "year");
      if (!years || years.length === 0) throw new ConfigurationError(`Query parameter "year" is required`);

      const table = await fetchTable(station, years.map(parseYear), transport, {
        datum: queryList(req, "datum"),
        period: queryString(req, "period"),
        rollup: queryString(req, "rollup"),
        upsampleFirst: queryBoolean(req, "upsample"),
        timeZone: queryString(req, "tz"),
        includeControl: queryBoolean(req, "control"),
        includeQualityCodes: queryBoolean(req, "qualityCodes"),
        tempScale: queryString(req, "tempScale"),
      });

      res.json({ usafId: station.usafId, timeZone: table.timeZone, rows: tableToRows(table) });
    })
  );

  router.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${req.method} ${req.originalUrl} failed (${status}): ${message}`);
    res.status(status).json({ error: message });
  });

  return router;
}

export function createApp(deps: ApiDeps): express.Express {
  const app = express();
  app.use(express.json());
  app.use(createApi(deps));
  return app;
}
