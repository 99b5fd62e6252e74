import fs from "fs/promises";
import path from "path";
import { gunzipSync } from "zlib";
import { TransportError } from "./errors.js";

/** Source of raw data files. `open` resolves to the file's (decompressed) bytes. */
export interface Transport {
  open(filename: string): Promise<Uint8Array>;
}

/** Data files ending in ".z" or ".gz" are gzip-compressed. */
export function isCompressed(filename: string): boolean {
  return filename.endsWith(".z") || filename.endsWith(".gz");
}

export function decompressFor(filename: string, data: Uint8Array): Uint8Array {
  if (!isCompressed(filename)) return data;
  try {
    return new Uint8Array(gunzipSync(data));
  } catch (err) {
    throw new TransportError(`Could not decompress ${filename}: ${err instanceof Error ? err.message : String(err)}`, filename);
  }
}

/** Reads files from NOAA's HTTPS data server (or any server with the same layout). */
export class HttpTransport implements Transport {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 15000
  ) {}

  async open(filename: string): Promise<Uint8Array> {
    const url = new URL(filename.replace(/^\/+/, ""), this.baseUrl.endsWith("/") ? this.baseUrl : `${this.baseUrl}/`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    // the timeout covers the body as well as the headers
    let body: Uint8Array;
    try {
      const res = await fetch(url, { signal: controller.signal });
      if (!res.ok) {
        throw new TransportError(`Fetch failed for ${url}: ${res.status} ${res.statusText}`, filename, res.status);
      }
      body = new Uint8Array(await res.arrayBuffer());
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(
        `Request for ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        filename
      );
    } finally {
      clearTimeout(timeoutId);
    }

    return decompressFor(filename, body);
  }
}

/** Reads files from a local mirror of the data server's directory tree. */
export class DirectoryTransport implements Transport {
  constructor(private readonly root: string) {}

  async open(filename: string): Promise<Uint8Array> {
    const fullPath = path.join(this.root, filename);
    let data: Buffer;
    try {
      data = await fs.readFile(fullPath);
    } catch (err) {
      throw new TransportError(`Could not read ${fullPath}: ${err instanceof Error ? err.message : String(err)}`, filename);
    }
    return decompressFor(filename, new Uint8Array(data));
  }
}

/** Serves files from memory; for tests and for data already downloaded by other means. */
export class MemoryTransport implements Transport {
  private readonly files: Map<string, Uint8Array>;

  constructor(files: Record<string, Uint8Array | string> = {}) {
    this.files = new Map(
      Object.entries(files).map(([name, contents]) => [
        name,
        typeof contents === "string" ? new TextEncoder().encode(contents) : contents,
      ])
    );
  }

  async open(filename: string): Promise<Uint8Array> {
    const data = this.files.get(filename);
    if (!data) throw new TransportError(`No such file: ${filename}`, filename, 404);
    return decompressFor(filename, data);
  }
}
