/**
 * Browser management utilities for Puppeteer
 *
 * Pages that render their content with client-side scripts are loaded in
 * headless Chrome and handed to the extractors as parsed documents.
 */

import puppeteer, { type Browser, type Page } from "puppeteer-core";
import { parseDocument } from "./dom.js";
import { ConfigError, FetchError, errorMessage } from "./errors.js";
import type { DocumentFetcher } from "./fetcher.js";
import { delay } from "./utils.js";

/**
 * Realistic Chrome user agent to avoid bot detection.
 * Matches a recent stable Chrome version on macOS.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Default viewport dimensions for the browser page */
export const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

/** Navigation timeout for a single page (ms) */
export const NAVIGATION_TIMEOUT = 30000;

/** Environment variables consulted for the Chrome executable, in order */
export const CHROME_PATH_ENV_VARS = ["CHROME_PATH", "PUPPETEER_EXECUTABLE_PATH"] as const;

/**
 * Find the Chrome executable: the explicit path, else the first environment variable set.
 *
 * @param explicitPath - Path given on the command line
 * @param env - Environment to read
 * @returns Executable path, or null when none is configured
 */
export function resolveExecutablePath(
  explicitPath: string | null | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (explicitPath) return explicitPath;
  for (const name of CHROME_PATH_ENV_VARS) {
    const value = env[name];
    if (value) return value;
  }
  return null;
}

/**
 * Launch a new headless browser instance with security sandbox disabled.
 * The sandbox is disabled for compatibility in Docker/CI environments.
 *
 * @param executablePath - Chrome or Chromium binary to run
 * @returns Promise resolving to a Browser instance
 */
export function launchBrowser(executablePath: string): Promise<Browser> {
  return puppeteer.launch({
    executablePath,
    headless: true,
    args: ["--no-sandbox", "--disable-setuid-sandbox"],
  });
}

/**
 * Create a new page with realistic browser settings.
 * Sets user agent and viewport to mimic a real Chrome browser.
 *
 * @param browser - Browser instance to create the page in
 * @returns Promise resolving to a configured Page instance
 */
export async function createPage(browser: Browser): Promise<Page> {
  const page = await browser.newPage();
  await page.setUserAgent(DEFAULT_USER_AGENT);
  await page.setViewport(DEFAULT_VIEWPORT);
  return page;
}

/**
 * Load pages in one shared headless browser tab. The browser starts on the
 * first fetch; concurrent fetches are serialized because they share the tab.
 */
export class BrowserDocumentFetcher implements DocumentFetcher {
  private readonly executablePath: string;
  private session: Promise<{ browser: Browser; page: Page }> | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  /**
   * @param executablePath - Chrome binary; falls back to CHROME_PATH / PUPPETEER_EXECUTABLE_PATH
   * @throws {ConfigError} When no executable is configured
   */
  constructor(executablePath?: string | null) {
    const resolved = resolveExecutablePath(executablePath);
    if (!resolved) {
      throw new ConfigError(
        `No Chrome executable configured. Pass --chrome <path> or set ${CHROME_PATH_ENV_VARS.join(" or ")}.`,
      );
    }
    this.executablePath = resolved;
  }

  private open(): Promise<{ browser: Browser; page: Page }> {
    this.session ??= launchBrowser(this.executablePath)
      .then(async (browser) => ({ browser, page: await createPage(browser) }))
      .catch((error: unknown) => {
        this.session = null;
        throw new FetchError(`Failed to launch browser: ${errorMessage(error)}`, this.executablePath, { cause: error });
      });
    return this.session;
  }

  fetch(url: string, waitHint: number): Promise<Document> {
    const run = this.queue.then(() => this.load(url, waitHint));
    // The caller sees failures through `run`; the queue only orders calls
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(url: string, waitHint: number): Promise<Document> {
    const { page } = await this.open();

    let html: string;
    try {
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT });
      // Wait for JS to render content
      await delay(waitHint);
      html = await page.content();
    } catch (error) {
      throw new FetchError(errorMessage(error), url, { cause: error });
    }

    return parseDocument(html, url);
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      const { browser } = await session;
      await browser.close();
    }
  }
}
