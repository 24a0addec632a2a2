/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Per-listing errors (extraction, date, time) are caught where a single
 * listing is handled and turned into a recorded skip. FetchError and
 * StorageError reach the caller of a venue run.
 */
export class IngestError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends IngestError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.url = url;
    this.status = options?.status ?? null;
  }
}

/** A required field is missing from one listing fragment. */
export class ExtractionError extends IngestError {}

export class DateParseError extends IngestError {}

export class TimeParseError extends IngestError {}

export class StorageError extends IngestError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
