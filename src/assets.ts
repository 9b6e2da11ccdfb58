/**
 * Image assets: download once per URL, store locally, share the local path
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { AssetError, FetchError, errorMessage } from "./errors.js";
import { fetchWithRetry, type RetryOptions } from "./fetcher.js";

/** Persists downloaded bytes under a suggested name */
export interface AssetStore {
  /** @returns Local path of the stored file */
  save(bytes: Uint8Array, suggestedName: string): Promise<string>;
}

export interface FetchedAsset {
  bytes: Uint8Array;
  contentType: string | null;
}

/** Downloads the bytes behind an asset URL */
export type AssetFetcher = (url: string) => Promise<FetchedAsset>;

/** Where an asset is first referenced, used to name its file */
export interface AssetPosition {
  chapter: number;
  article: number;
  image: number;
}

/**
 * Store assets as files in one directory, created on first save.
 */
export class FileAssetStore implements AssetStore {
  constructor(private readonly dir: string) {}

  async save(bytes: Uint8Array, suggestedName: string): Promise<string> {
    await fs.mkdir(this.dir, { recursive: true });
    const filepath = path.join(this.dir, suggestedName);
    await fs.writeFile(filepath, bytes);
    return filepath;
  }
}

/**
 * Create an asset fetcher over HTTP with retries.
 *
 * @param retry - Retry behaviour for transient failures
 * @returns Fetcher rejecting with {@link FetchError} on a non-OK response
 */
export function httpAssetFetcher(retry?: RetryOptions): AssetFetcher {
  return async (url) => {
    const response = await fetchWithRetry(url, {}, retry);
    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status}`, url);
    }
    return {
      bytes: new Uint8Array(await response.arrayBuffer()),
      contentType: response.headers.get("content-type"),
    };
  };
}

/**
 * Pick a file extension for a content type, defaulting to `.jpg`.
 *
 * @example
 * extensionForContentType('image/png; charset=binary') // '.png'
 * extensionForContentType(null) // '.jpg'
 */
export function extensionForContentType(contentType: string | null): string {
  const type = (contentType ?? "").toLowerCase();
  if (type.includes("png")) return ".png";
  if (type.includes("gif")) return ".gif";
  if (type.includes("svg")) return ".svg";
  if (type.includes("webp")) return ".webp";
  return ".jpg";
}

/**
 * Build the file name of an asset from the position it was first seen at.
 *
 * @example
 * assetName({ chapter: 2, article: 3, image: 1 }, '.png') // 'ch2_art3_img1.png'
 */
export function assetName(position: AssetPosition, extension: string): string {
  return `ch${position.chapter}_art${position.article}_img${position.image}${extension}`;
}

/**
 * Per-session cache from asset URL to local path.
 *
 * The pending download is memoized per URL, so concurrent callers for the
 * same URL share one fetch. A failed download is cached as null and never
 * retried within the session.
 */
export class AssetDeduplicator {
  private readonly cache = new Map<string, Promise<string | null>>();
  private downloaded = 0;
  private failures: AssetError[] = [];

  constructor(
    private readonly fetchAsset: AssetFetcher,
    private readonly store: AssetStore,
  ) {}

  /** Number of distinct assets stored */
  get downloadedCount(): number {
    return this.downloaded;
  }

  /** Number of distinct assets that failed */
  get failedCount(): number {
    return this.failures.length;
  }

  /** Failures recorded so far, in the order they happened */
  get errors(): readonly AssetError[] {
    return this.failures;
  }

  /**
   * Get the local path for an asset, downloading it on first use.
   *
   * @param url - Absolute asset URL
   * @param position - Position of the first reference, used for the file name
   * @returns Local path, or null when the asset could not be downloaded or stored
   */
  resolve(url: string, position: AssetPosition): Promise<string | null> {
    let pending = this.cache.get(url);
    if (!pending) {
      pending = this.download(url, position);
      this.cache.set(url, pending);
    }
    return pending;
  }

  private async download(url: string, position: AssetPosition): Promise<string | null> {
    try {
      const { bytes, contentType } = await this.fetchAsset(url);
      const localPath = await this.store.save(bytes, assetName(position, extensionForContentType(contentType)));
      this.downloaded++;
      return localPath;
    } catch (error) {
      this.failures.push(new AssetError(errorMessage(error), url, { cause: error }));
      return null;
    }
  }

  /** Forget every cached path and reset the counters, ending the session */
  clear(): void {
    this.cache.clear();
    this.downloaded = 0;
    this.failures = [];
  }
}
