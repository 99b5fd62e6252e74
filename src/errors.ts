/** Base class for every error raised by the decoder, rollup engine and fetch pipeline. */
export class IsdError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raw text does not conform to the ISD fixed-width layout. When raised while
 * reading a file, `source` and `line` locate the offending record.
 */
export class FormatError extends IsdError {
  readonly source?: string;
  readonly line?: number;

  constructor(message: string, location: { source?: string; line?: number } = {}) {
    const where = location.source
      ? ` (${location.source}${location.line !== undefined ? `:${location.line}` : ""})`
      : "";
    super(`${message}${where}`);
    this.source = location.source;
    this.line = location.line;
  }

  /** Copy of a line-level error carrying the file and line it came from. */
  at(source: string, line: number): FormatError {
    return new FormatError(this.message, { source, line });
  }
}

/** Invalid caller input: unknown rollup policy, bad period, unknown field, unknown station. */
export class ConfigurationError extends IsdError {}

/** A file could not be retrieved from the data server or mirror. */
export class TransportError extends IsdError {
  readonly filename: string;
  readonly status?: number;

  constructor(message: string, filename: string, status?: number) {
    super(message);
    this.filename = filename;
    this.status = status;
  }
}

/** The metadata store has no station with the requested USAF id. */
export class UnknownStationError extends ConfigurationError {
  constructor(readonly usafId: string) {
    super(`No station with USAF id "${usafId}" in the metadata store`);
  }
}
