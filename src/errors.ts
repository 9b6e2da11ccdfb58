/**
 * Error taxonomy and result type shared by the scrapers
 */

/** Category of a failure; only fetch-layer failures occur in normal operation */
export type ErrorKind = "fetch" | "parse" | "asset" | "config";

/** Base class for every error raised by the scrapers */
export class ScraperError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScraperError";
    this.kind = kind;
  }
}

/** Network, HTTP status or timeout failure while loading a document or asset */
export class FetchError extends ScraperError {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super("fetch", message, options);
    this.name = "FetchError";
    this.url = url;
  }
}

/** Structure that could not be turned into a record at all */
export class ParseError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse", message, options);
    this.name = "ParseError";
  }
}

/** Image could not be downloaded or stored */
export class AssetError extends ScraperError {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super("asset", message, options);
    this.name = "AssetError";
    this.url = url;
  }
}

/** Required capability missing when a component is constructed */
export class ConfigError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** Serialized error record that replaces a whole job posting or book */
export interface ErrorRecord {
  error: string;
  url: string;
  scrapedAt: string;
}

/** Failure of `scrape` or `scrapeCollection` */
export interface ScrapeFailure extends ErrorRecord {
  kind: ErrorKind;
}

export type ExtractionError = ScrapeFailure;
export type CrawlError = ScrapeFailure;

/**
 * Get a printable message from any thrown value.
 *
 * @param error - Caught value
 * @returns The error message, or the value converted to a string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert a result into its consumer-facing JSON shape: the record itself,
 * or a `{ error, url, scrapedAt }` object.
 *
 * @param result - Result of a scrape
 * @returns Record or error record
 */
export function serializeResult<T>(result: Result<T, ScrapeFailure>): T | ErrorRecord {
  if (result.ok) return result.value;
  const { error, url, scrapedAt } = result.error;
  return { error, url, scrapedAt };
}
