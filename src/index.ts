/**
 * Library entry point: job posting and book scrapers plus their building blocks
 */

export {
  AssetDeduplicator,
  FileAssetStore,
  assetName,
  extensionForContentType,
  httpAssetFetcher,
  type AssetFetcher,
  type AssetPosition,
  type AssetStore,
  type FetchedAsset,
} from "./assets.js";
export { BrowserDocumentFetcher, resolveExecutablePath } from "./browser.js";
export { collectImages, findContentArea, structureContent, type DiscoveredImage } from "./content.js";
export {
  BookScraper,
  CrawlOrchestrator,
  type BookScraperOptions,
  type CollectionRunOptions,
  type CrawlOptions,
  type CrawlProgress,
  type CrawlState,
} from "./crawl.js";
export { parseDocument } from "./dom.js";
export * from "./errors.js";
export { HttpDocumentFetcher, fetchWithRetry, type DocumentFetcher, type RetryOptions } from "./fetcher.js";
export { extractField, harvestSection, type FieldRule } from "./fields.js";
export { JobScraper, extractJobPosting, type BatchOptions, type JobScraperOptions } from "./job.js";
export { buildLearningPack, renderBlocks, type LearningPack, type LearningUnit } from "./learning.js";
export { computeMetadata } from "./metadata.js";
export { resolveTableOfContents } from "./toc.js";
export * from "./types.js";
