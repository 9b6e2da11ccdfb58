/**
 * Scrape a book: its table of contents, every article page and their images
 *
 * Usage: npm run scrape -- <book-url> [options]
 * Example: npm run scrape -- https://example.com/book --wait 1000 --delay 1000
 *
 * Options:
 *   --wait ms           Page render wait time (default: 1000)
 *   --delay ms          Delay between articles (default: 1000)
 *   --concurrency n     Articles fetched at once (default: 1)
 *   --skip <url>        Skip specific URL (can be used multiple times)
 *   --url-pattern <p>   Only include URLs matching glob pattern
 *   --browser           Render pages in headless Chrome
 *   --chrome <path>     Chrome executable (default: $CHROME_PATH)
 *   --output <dir>      Output directory (default: output)
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { FileAssetStore, httpAssetFetcher } from "./assets.js";
import { BrowserDocumentFetcher, DEFAULT_USER_AGENT } from "./browser.js";
import { BookScraper, DEFAULT_ARTICLE_DELAY, DEFAULT_PAGE_WAIT } from "./crawl.js";
import { errorMessage, serializeResult } from "./errors.js";
import { type DocumentFetcher, HttpDocumentFetcher } from "./fetcher.js";
import { type Book, isFailedArticle } from "./types.js";
import {
  formatDuration,
  getMultiStringArg,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

const DEFAULT_OUTPUT_DIR = "output";

/** Configuration options for the scraper */
export interface ScraperOptions {
  /** Book landing page to scrape */
  startUrl: string;
  /** Wait time after page load for JS rendering (ms) */
  pageWait: number;
  /** Delay between scraping articles (ms) */
  articleDelay: number;
  /** Number of articles fetched at once */
  concurrency: number;
  /** URLs to skip during scraping */
  skipUrls: string[];
  /** Glob pattern to filter URLs */
  urlPattern: string | null;
  /** Render pages in headless Chrome instead of fetching plain HTML */
  browser: boolean;
  /** Chrome executable for --browser */
  chromePath: string | null;
  /** Directory for book.json and images/ */
  outputDir: string;
  /** Whether to show help and exit */
  showHelp: boolean;
}

/**
 * Print usage information for the scrape command.
 */
function showUsage(): void {
  console.log("Usage: npm run scrape -- <book-url> [options]");
  console.log("");
  console.log("Scrape a book's chapters and articles into output/book.json.");
  console.log("");
  console.log("Options:");
  console.log("  --wait <ms>          Page render wait time (default: 1000)");
  console.log("  --delay <ms>         Delay between articles (default: 1000)");
  console.log("  --concurrency <n>    Articles fetched at once (default: 1)");
  console.log("  --skip <url>         Skip specific URL (can be used multiple times)");
  console.log("  --url-pattern <p>    Only include URLs matching glob pattern");
  console.log("  --browser            Render pages in headless Chrome");
  console.log("  --chrome <path>      Chrome executable (default: $CHROME_PATH)");
  console.log("  --output <dir>       Output directory (default: output)");
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm run scrape -- https://example.com/book --wait 2000");
}

/** Flags that take values, used for positional argument detection */
const SCRAPER_VALUE_FLAGS = ["--wait", "--delay", "--concurrency", "--skip", "--url-pattern", "--chrome", "--output"];

/**
 * Parse command line arguments for the scrape command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed scraper options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): ScraperOptions {
  return {
    startUrl: getPositionalArg(args, SCRAPER_VALUE_FLAGS),
    pageWait: getNumberArg(args, "--wait", DEFAULT_PAGE_WAIT),
    articleDelay: getNumberArg(args, "--delay", DEFAULT_ARTICLE_DELAY),
    concurrency: Math.max(1, getNumberArg(args, "--concurrency", 1)),
    skipUrls: getMultiStringArg(args, "--skip"),
    urlPattern: getNullableStringArg(args, "--url-pattern"),
    browser: hasFlag(args, "--browser"),
    chromePath: getNullableStringArg(args, "--chrome"),
    outputDir: getStringArg(args, "--output", DEFAULT_OUTPUT_DIR),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/**
 * Create the document fetcher selected on the command line.
 *
 * @throws {ConfigError} When --browser is given without a Chrome executable
 */
export function createFetcher(browser: boolean, chromePath: string | null): DocumentFetcher {
  return browser ? new BrowserDocumentFetcher(chromePath) : new HttpDocumentFetcher({ userAgent: DEFAULT_USER_AGENT });
}

/**
 * Print scrape summary and return exit code.
 *
 * @param book - Scraped book
 * @param imageFailedCount - Images that could not be downloaded
 * @returns 1 when any article failed, else 0
 */
export function printScrapeSummary(book: Book, imageFailedCount: number): number {
  const failed = book.chapters.flatMap((chapter) =>
    chapter.articles.filter(isFailedArticle).map((article) => ({ chapter: chapter.number, article })),
  );

  console.log(
    `\nDone! Scraped ${book.totals.articleCount} articles in ${book.totals.chapterCount} chapters (${book.totals.imageCount} images).`,
  );

  if (book.cancelled) {
    console.log("Stopped early: the book is incomplete.");
  }

  if (imageFailedCount > 0) {
    console.log(`Warning: ${imageFailedCount} image(s) failed to download.`);
  }

  if (failed.length > 0) {
    console.log(`\nFailed articles (${failed.length}):`);
    for (const { chapter, article } of failed) {
      console.log(`  [${chapter}.${article.number}] ${article.url}: ${article.error}`);
    }
  }

  return failed.length > 0 ? 1 : 0;
}

/**
 * Main entry point for the scraper.
 * Resolves the table of contents, scrapes every article and writes book.json.
 *
 * @param args - Command line arguments
 * @param signal - Aborted to stop after the current article
 * @throws Exits with code 1 if no URL provided or scraping fails
 */
export async function main(args: string[] = process.argv.slice(2), signal?: AbortSignal): Promise<void> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.startUrl) {
    showUsage();
    process.exit(1);
  }

  // Validate URL format before attempting to scrape
  const urlValidation = validateUrl(options.startUrl);
  if (!urlValidation.isValid) {
    console.error(`Error: ${urlValidation.error}`);
    process.exit(1);
  }

  let fetcher: DocumentFetcher;
  try {
    fetcher = createFetcher(options.browser, options.chromePath);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  const scraper = new BookScraper({
    fetcher,
    assetFetcher: httpAssetFetcher(),
    assetStore: new FileAssetStore(path.join(options.outputDir, "images")),
    pageWait: options.pageWait,
    articleDelay: options.articleDelay,
    concurrency: options.concurrency,
    skipUrls: options.skipUrls,
    urlPattern: options.urlPattern,
  });

  // Register browser cleanup for shutdown on a second Ctrl+C
  onInterrupt(() => scraper.close());

  const started = Date.now();
  console.log(`Fetching table of contents: ${options.startUrl}`);

  try {
    const result = await scraper.scrapeCollection(options.startUrl, {
      signal,
      onProgress: ({ completed, total, title, failed }) => {
        progressBar(completed, total, failed ? `FAILED: ${title}` : title);
      },
    });

    await fs.mkdir(options.outputDir, { recursive: true });
    const bookPath = path.join(options.outputDir, "book.json");
    await fs.writeFile(bookPath, JSON.stringify(serializeResult(result), null, 2), "utf-8");

    if (!result.ok) {
      console.error(`Error: ${result.error.error}`);
      process.exit(1);
    }

    console.log(`\nSaved book to ${bookPath} in ${formatDuration(Date.now() - started)}`);

    const exitCode = printScrapeSummary(result.value, scraper.assets.failedCount);
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  } finally {
    await scraper.close();
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  const controller = new AbortController();
  setupSignalHandlers("Scraping", controller);
  main(process.argv.slice(2), controller.signal).catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
