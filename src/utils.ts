/**
 * Utility functions for the scrapers
 * Extracted for testability
 */

import type { Book } from "./types.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * With a `controller`, the first signal only aborts it so the running job can
 * wrap up and save what it has; a second signal exits.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Scraping")
 * @param controller - Optional controller aborted on the first signal
 */
export function setupSignalHandlers(commandName: string, controller?: AbortController): void {
  const handler = async (signal: string) => {
    if (controller && !controller.signal.aborted) {
      controller.abort();
      console.log(`\n${commandName} stopping after the current page. Press Ctrl+C again to exit now.`);
      return;
    }

    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error(`Cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    // Exit with appropriate code (128 + signal number)
    // SIGINT = 2, SIGTERM = 15
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void handler("SIGINT"));
  process.on("SIGTERM", () => void handler("SIGTERM"));
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Convert a simple glob pattern to a RegExp.
 * Supports: * (any chars except /), ** (any chars including /), ? (single char)
 *
 * @param pattern - Glob pattern to convert
 * @returns RegExp that matches the pattern
 *
 * @example
 * globToRegex('*.html').test('page.html') // true
 * globToRegex('**\/lesson-*').test('https://example.com/book/lesson-1') // true
 */
export function globToRegex(pattern: string): RegExp {
  const escaped = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape regex special chars (except * and ?)
    .replace(/\*\*/g, "{{GLOBSTAR}}") // Temp placeholder for **
    .replace(/\*/g, "[^/]*") // * matches anything except /
    .replace(/\?/g, "[^/]") // ? matches single char except /
    .replace(/\{\{GLOBSTAR\}\}/g, ".*"); // ** matches anything including /
  return new RegExp(`^${escaped}$`);
}

/**
 * Create a safe filename from a title.
 * Converts to lowercase, replaces special characters with dashes,
 * and truncates to 50 characters.
 *
 * @param title - Title to convert to filename
 * @returns Sanitized filename safe for filesystem use
 *
 * @example
 * sanitizeFilename('Senior Engineer (Remote)') // 'senior-engineer-remote'
 * sanitizeFilename('Привет Мир') // 'привет-мир'
 */
export function sanitizeFilename(title: string): string {
  return title
    .toLowerCase()
    // Keep letters and digits of any script; replace all else with dashes
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 50);
}

/**
 * Extract the base URL (protocol + host) from a full URL.
 *
 * @param url - Full URL to extract base from
 * @returns Base URL containing protocol and host
 * @throws {TypeError} If URL is invalid
 *
 * @example
 * getBaseUrl('https://example.com/path/to/page') // 'https://example.com'
 * getBaseUrl('http://localhost:3000/page') // 'http://localhost:3000'
 */
export function getBaseUrl(url: string): string {
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}`;
}

/**
 * Generate a markdown anchor from a heading title.
 * Matches the anchor generation used by GitHub/CommonMark style processors.
 *
 * @param title - Heading title to convert to anchor
 * @returns Anchor ID suitable for markdown links
 *
 * @example
 * generateAnchor('Hello World') // 'hello-world'
 * generateAnchor('Chapter 1: Introduction') // 'chapter-1-introduction'
 */
export function generateAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/ /g, "-") // Replace spaces with hyphens
    .replace(/[^\p{L}\p{N}-]/gu, "")
    .replace(/^-+|-+$/g, ""); // Strip leading/trailing hyphens
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag is present in arguments.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--output')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      result = value;
    }
  }
  return result;
}

/**
 * Get a nullable string argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--url-pattern')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      return value;
    }
  }
  return null;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--wait')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value) {
      const parsed = parseInt(value, 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get all values for a repeatable string argument.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--skip')
 * @returns Array of all values for the flag
 */
export function getMultiStringArg(args: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Get all positional (non-flag) arguments.
 * Skips values that follow flags (e.g., in '--wait 1000', skips '1000').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns Non-flag arguments in order
 */
export function getPositionalArgs(args: string[], knownFlags: string[] = []): string[] {
  const positional: string[] = [];
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }
  return positional;
}

/**
 * Get the first positional (non-flag) argument.
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  return getPositionalArgs(args, knownFlags)[0] ?? "";
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url || typeof url !== "string") {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}

/** Result of book.json validation */
export interface BookValidationResult {
  isValid: boolean;
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the structure of book.json content.
 * Checks that all required fields exist and have correct types.
 *
 * @param data - Parsed JSON data to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateBook({ error: 'Error processing book: HTTP 404', url: '...', scrapedAt: '...' })
 * // { isValid: false, error: 'book.json holds a failed scrape: Error processing book: HTTP 404' }
 */
export function validateBook(data: unknown): BookValidationResult {
  if (!isRecord(data)) {
    return { isValid: false, error: "book.json must be an object" };
  }

  if (typeof data.error === "string") {
    return { isValid: false, error: `book.json holds a failed scrape: ${data.error}` };
  }

  for (const field of ["title", "url", "scrapedAt"]) {
    if (typeof data[field] !== "string") {
      return { isValid: false, error: `Missing or invalid field: ${field} (expected string)` };
    }
  }

  if (!Array.isArray(data.chapters)) {
    return { isValid: false, error: "Missing or invalid field: chapters (expected array)" };
  }

  if (!isRecord(data.totals)) {
    return { isValid: false, error: "Missing or invalid field: totals (expected object)" };
  }

  for (let i = 0; i < data.chapters.length; i++) {
    const chapter: unknown = data.chapters[i];
    if (!isRecord(chapter)) {
      return { isValid: false, error: `chapters[${i}] must be an object` };
    }

    if (typeof chapter.number !== "number") {
      return { isValid: false, error: `chapters[${i}].number must be a number` };
    }

    if (typeof chapter.title !== "string") {
      return { isValid: false, error: `chapters[${i}].title must be a string` };
    }

    if (!Array.isArray(chapter.articles)) {
      return { isValid: false, error: `chapters[${i}].articles must be an array` };
    }

    for (let j = 0; j < chapter.articles.length; j++) {
      const article: unknown = chapter.articles[j];
      const where = `chapters[${i}].articles[${j}]`;
      if (!isRecord(article)) {
        return { isValid: false, error: `${where} must be an object` };
      }
      if (typeof article.title !== "string" || typeof article.url !== "string") {
        return { isValid: false, error: `${where} must have a string title and url` };
      }
      if (typeof article.error !== "string" && (!isRecord(article.content) || !isRecord(article.metadata))) {
        return { isValid: false, error: `${where} must have content and metadata, or an error` };
      }
    }
  }

  return { isValid: true };
}

/**
 * Narrow parsed JSON to a Book when it passes {@link validateBook}.
 */
export function isBook(data: unknown): data is Book {
  return validateBook(data).isValid;
}
