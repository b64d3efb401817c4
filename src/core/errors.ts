/** Base class for every error the scraper raises on purpose */
export class ScraperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A page or image could not be fetched (network failure or non-2xx status) */
export class TransportError extends ScraperError {
  constructor(
    readonly url: string,
    readonly status: number | null,
    message: string
  ) {
    super(message);
  }
}

/** Structured metadata was malformed or an expected markup element was absent */
export class ParseError extends ScraperError {
  constructor(readonly source: string, message: string) {
    super(message);
  }
}

/** A product record is missing one of its required fields */
export class ValidationError extends ScraperError {
  constructor(readonly url: string, readonly missing: string[]) {
    super(`Missing required field(s): ${missing.join(", ")}`);
  }
}

export class ImageFetchError extends ScraperError {
  constructor(readonly url: string, readonly destination: string | null, message: string) {
    super(message);
  }
}

/** An output sink failed to write its file */
export class StorageError extends ScraperError {
  constructor(readonly sink: string, message: string) {
    super(message);
  }
}

/** Run-level failure: nothing useful can be produced */
export class FatalRunError extends ScraperError {}
