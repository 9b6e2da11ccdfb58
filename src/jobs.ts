/**
 * Scrape job postings into JSON records
 *
 * Usage: npm run jobs -- <url> [<url>...] [options]
 * Example: npm run jobs -- https://www.seek.com.au/job/12345 --output jobs
 *
 * Options:
 *   --wait ms           Page render wait time (default: 1000)
 *   --delay ms          Delay between postings (default: 1000)
 *   --browser           Render pages in headless Chrome
 *   --chrome <path>     Chrome executable (default: $CHROME_PATH)
 *   --output <dir>      Output directory (default: output/jobs)
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type ExtractionError, type Result, errorMessage, serializeResult } from "./errors.js";
import type { DocumentFetcher } from "./fetcher.js";
import { DEFAULT_JOB_DELAY, DEFAULT_JOB_PAGE_WAIT, JobScraper } from "./job.js";
import { createFetcher, progressBar } from "./scrape.js";
import type { JobPosting } from "./types.js";
import {
  getNullableStringArg,
  getNumberArg,
  getPositionalArgs,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  sanitizeFilename,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

const DEFAULT_OUTPUT_DIR = path.join("output", "jobs");

/** Configuration options for the jobs command */
export interface JobsOptions {
  urls: string[];
  pageWait: number;
  delay: number;
  browser: boolean;
  chromePath: string | null;
  outputDir: string;
  showHelp: boolean;
}

/**
 * Print usage information for the jobs command.
 */
function showUsage(): void {
  console.log("Usage: npm run jobs -- <url> [<url>...] [options]");
  console.log("");
  console.log("Scrape job postings into one JSON file each plus jobs.json.");
  console.log("");
  console.log("Options:");
  console.log("  --wait <ms>          Page render wait time (default: 1000)");
  console.log("  --delay <ms>         Delay between postings (default: 1000)");
  console.log("  --browser            Render pages in headless Chrome");
  console.log("  --chrome <path>      Chrome executable (default: $CHROME_PATH)");
  console.log("  --output <dir>       Output directory (default: output/jobs)");
  console.log("  --help, -h           Show this help message");
}

/** Flags that take values, used for positional argument detection */
const JOBS_VALUE_FLAGS = ["--wait", "--delay", "--chrome", "--output"];

/**
 * Parse command line arguments for the jobs command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): JobsOptions {
  return {
    urls: getPositionalArgs(args, JOBS_VALUE_FLAGS),
    pageWait: getNumberArg(args, "--wait", DEFAULT_JOB_PAGE_WAIT),
    delay: getNumberArg(args, "--delay", DEFAULT_JOB_DELAY),
    browser: hasFlag(args, "--browser"),
    chromePath: getNullableStringArg(args, "--chrome"),
    outputDir: getStringArg(args, "--output", DEFAULT_OUTPUT_DIR),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Build the file name of one posting's JSON file.
 *
 * @example
 * jobFilename(0, 'Senior Engineer (Remote)') // '001-senior-engineer-remote.json'
 * jobFilename(4, null) // '005-job.json'
 */
export function jobFilename(index: number, title: string | null): string {
  const name = sanitizeFilename(title ?? "") || "job";
  return `${String(index + 1).padStart(3, "0")}-${name}.json`;
}

function resultLabel(result: Result<JobPosting, ExtractionError>): string {
  return result.ok ? (result.value.title ?? result.value.url) : `FAILED: ${result.error.url}`;
}

/**
 * Main entry point for the jobs command.
 *
 * @param args - Command line arguments
 * @param signal - Aborted to stop after the current posting
 * @throws Exits with code 1 if no URL is given, a URL is invalid, or a posting failed
 */
export async function main(args: string[] = process.argv.slice(2), signal?: AbortSignal): Promise<void> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (options.urls.length === 0) {
    showUsage();
    process.exit(1);
  }

  for (const url of options.urls) {
    const validation = validateUrl(url);
    if (!validation.isValid) {
      console.error(`Error: ${url}: ${validation.error}`);
      process.exit(1);
    }
  }

  let fetcher: DocumentFetcher;
  try {
    fetcher = createFetcher(options.browser, options.chromePath);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  const scraper = new JobScraper({ fetcher, pageWait: options.pageWait });
  onInterrupt(() => scraper.close());

  console.log(`Scraping ${options.urls.length} job posting(s)...\n`);

  try {
    const results = await scraper.scrapeMany(options.urls, {
      delay: options.delay,
      signal,
      onResult: (result, index, total) => progressBar(index, total, resultLabel(result)),
    });

    await fs.mkdir(options.outputDir, { recursive: true });

    const records = results.map((result) => serializeResult(result));
    for (const [index, result] of results.entries()) {
      const filename = jobFilename(index, result.ok ? result.value.title : null);
      await fs.writeFile(path.join(options.outputDir, filename), JSON.stringify(records[index], null, 2), "utf-8");
    }

    const indexPath = path.join(options.outputDir, "jobs.json");
    await fs.writeFile(indexPath, JSON.stringify(records, null, 2), "utf-8");

    const failed = results.filter((result) => !result.ok).length;
    console.log(`\nDone! Saved ${results.length - failed} posting(s) to ${options.outputDir}.`);

    if (results.length < options.urls.length) {
      console.log(`Stopped early: ${options.urls.length - results.length} posting(s) not scraped.`);
    }

    if (failed > 0) {
      console.log(`Failed postings (${failed}):`);
      for (const result of results) {
        if (!result.ok) console.log(`  ${result.error.url}: ${result.error.error}`);
      }
      process.exit(1);
    }
  } finally {
    await scraper.close();
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  const controller = new AbortController();
  setupSignalHandlers("Job scraping", controller);
  main(process.argv.slice(2), controller.signal).catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
