import { afterEach, describe, expect, it, vi } from "vitest";
import {
  delay,
  setupSignalHandlers,
  formatDuration,
  generateAnchor,
  getBaseUrl,
  getMultiStringArg,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  getPositionalArgs,
  getStringArg,
  globToRegex,
  hasFlag,
  hasHelpFlag,
  isBook,
  sanitizeFilename,
  validateBook,
  validateUrl,
} from "./utils.js";

describe("globToRegex", () => {
  it("matches exact strings", () => {
    const regex = globToRegex("hello");
    expect(regex.test("hello")).toBe(true);
    expect(regex.test("hello!")).toBe(false);
    expect(regex.test("say hello")).toBe(false);
  });

  it("handles * wildcard (matches anything except /)", () => {
    const regex = globToRegex("*.html");
    expect(regex.test("page.html")).toBe(true);
    expect(regex.test("index.html")).toBe(true);
    expect(regex.test(".html")).toBe(true);
    expect(regex.test("path/page.html")).toBe(false);
  });

  it("handles ** wildcard (matches anything including /)", () => {
    // ** matches any characters including /
    const regex = globToRegex("**page*.html");
    expect(regex.test("page1.html")).toBe(true);
    expect(regex.test("https://example.com/page123.html")).toBe(true);
    expect(regex.test("https://example.com/path/page456.html")).toBe(true);

    // **/file means "slash then file" at any path depth
    const regex2 = globToRegex("**/page*.html");
    expect(regex2.test("/page1.html")).toBe(true);
    expect(regex2.test("https://example.com/page123.html")).toBe(true);
    expect(regex2.test("page1.html")).toBe(false); // no leading /
  });

  it("handles ? wildcard (matches single char)", () => {
    const regex = globToRegex("page?.html");
    expect(regex.test("page1.html")).toBe(true);
    expect(regex.test("pageA.html")).toBe(true);
    expect(regex.test("page.html")).toBe(false);
    expect(regex.test("page12.html")).toBe(false);
  });

  it("escapes regex special characters", () => {
    const regex = globToRegex("file.name+test.html");
    expect(regex.test("file.name+test.html")).toBe(true);
    expect(regex.test("fileXname+test.html")).toBe(false);
  });

  it("handles URL patterns", () => {
    const regex = globToRegex("*/page*.html");
    expect(regex.test("https://example.com/page123.html")).toBe(false); // * doesn't match /

    const regex2 = globToRegex("**/page*.html");
    expect(regex2.test("https://example.com/page123.html")).toBe(true);
  });
});

describe("sanitizeFilename", () => {
  it("converts to lowercase and replaces special chars with dashes", () => {
    expect(sanitizeFilename("Senior Engineer (Remote)")).toBe("senior-engineer-remote");
  });

  it("keeps letters of any script", () => {
    expect(sanitizeFilename("Привет Мир")).toBe("привет-мир");
    expect(sanitizeFilename("Ingénieur Logiciel")).toBe("ingénieur-logiciel");
  });

  it("removes leading and trailing dashes", () => {
    expect(sanitizeFilename("---test---")).toBe("test");
  });

  it("truncates to 50 characters", () => {
    const longTitle = "Graduate Data Analyst with a focus on reporting and dashboards for retail";
    expect(sanitizeFilename(longTitle)).toHaveLength(50);
  });

  it("returns an empty string when nothing usable remains", () => {
    expect(sanitizeFilename("!!! ???")).toBe("");
  });

  it("collapses multiple special chars into single dash", () => {
    expect(sanitizeFilename("test...file___name")).toBe("test-file-name");
  });
});

describe("getBaseUrl", () => {
  it("extracts protocol and host from URL", () => {
    expect(getBaseUrl("https://example.com/path/to/page")).toBe("https://example.com");
  });

  it("preserves port if present", () => {
    expect(getBaseUrl("http://localhost:3000/page")).toBe("http://localhost:3000");
  });

  it("handles URLs with query strings", () => {
    expect(getBaseUrl("https://example.com/page?foo=bar")).toBe("https://example.com");
  });

  it("handles URLs with fragments", () => {
    expect(getBaseUrl("https://example.com/page#section")).toBe("https://example.com");
  });

  it("throws for invalid URLs", () => {
    expect(() => getBaseUrl("not-a-url")).toThrow();
  });
});

describe("generateAnchor", () => {
  it("converts to lowercase and replaces spaces with dashes", () => {
    expect(generateAnchor("Getting Started")).toBe("getting-started");
  });

  it("keeps non-Latin letters", () => {
    expect(generateAnchor("Основы работы")).toBe("основы-работы");
  });

  it("strips trailing spaces and punctuation", () => {
    expect(generateAnchor("Managing Users ")).toBe("managing-users");
    expect(generateAnchor("Roles, permissions, and groups.")).toBe("roles-permissions-and-groups");
  });

  it("strips leading spaces and punctuation", () => {
    expect(generateAnchor(" Leading space")).toBe("leading-space");
    expect(generateAnchor("...Title")).toBe("title");
  });

  it("handles parentheses in titles", () => {
    expect(generateAnchor("Single Sign-On (SSO)")).toBe("single-sign-on-sso");
  });

  it("preserves hyphens from the title", () => {
    // Space-hyphen-space becomes three hyphens
    expect(generateAnchor("Setup - Admin Console")).toBe("setup---admin-console");
  });

  it("handles mixed content", () => {
    expect(generateAnchor("Chapter 1: Introduction (Part 1)")).toBe("chapter-1-introduction-part-1");
  });
});

describe("setupSignalHandlers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("aborts the controller on the first signal instead of exiting", () => {
    const onSpy = vi.spyOn(process, "on").mockImplementation(() => process);
    const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const controller = new AbortController();

    setupSignalHandlers("Scraping", controller);
    const sigint = onSpy.mock.calls.find(([event]) => event === "SIGINT");
    sigint?.[1]();

    expect(controller.signal.aborted).toBe(true);
    expect(logSpy).toHaveBeenCalledWith(
      "\nScraping stopping after the current page. Press Ctrl+C again to exit now.",
    );
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it("registers handlers for SIGINT and SIGTERM", () => {
    const onSpy = vi.spyOn(process, "on").mockImplementation(() => process);

    setupSignalHandlers("Merge");

    expect(onSpy).toHaveBeenCalledWith("SIGINT", expect.any(Function));
    expect(onSpy).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
  });
});

describe("validateUrl", () => {
  it("accepts valid http URLs", () => {
    expect(validateUrl("http://example.com")).toEqual({ isValid: true });
    expect(validateUrl("http://example.com/path")).toEqual({ isValid: true });
    expect(validateUrl("http://example.com:8080/path")).toEqual({ isValid: true });
  });

  it("accepts valid https URLs", () => {
    expect(validateUrl("https://example.com")).toEqual({ isValid: true });
    expect(validateUrl("https://example.com/path/to/page")).toEqual({ isValid: true });
    expect(validateUrl("https://sub.example.com")).toEqual({ isValid: true });
  });

  it("rejects empty or missing URLs", () => {
    expect(validateUrl("")).toEqual({ isValid: false, error: "URL is required" });
    expect(validateUrl(null as unknown as string)).toEqual({ isValid: false, error: "URL is required" });
    expect(validateUrl(undefined as unknown as string)).toEqual({ isValid: false, error: "URL is required" });
  });

  it("rejects invalid URL format", () => {
    expect(validateUrl("not-a-url")).toEqual({ isValid: false, error: "Invalid URL format" });
    expect(validateUrl("example.com")).toEqual({ isValid: false, error: "Invalid URL format" });
    expect(validateUrl("://missing-protocol.com")).toEqual({ isValid: false, error: "Invalid URL format" });
  });

  it("rejects non-http/https protocols", () => {
    expect(validateUrl("ftp://example.com")).toEqual({ isValid: false, error: "URL must use http or https protocol" });
    expect(validateUrl("file:///path/to/file")).toEqual({
      isValid: false,
      error: "URL must use http or https protocol",
    });
    expect(validateUrl("mailto:test@example.com")).toEqual({
      isValid: false,
      error: "URL must use http or https protocol",
    });
  });
});

describe("hasHelpFlag", () => {
  it("returns true for --help", () => {
    expect(hasHelpFlag(["--help"])).toBe(true);
    expect(hasHelpFlag(["arg", "--help"])).toBe(true);
  });

  it("returns true for -h", () => {
    expect(hasHelpFlag(["-h"])).toBe(true);
    expect(hasHelpFlag(["arg", "-h", "other"])).toBe(true);
  });

  it("returns false when no help flag present", () => {
    expect(hasHelpFlag([])).toBe(false);
    expect(hasHelpFlag(["--name", "value"])).toBe(false);
  });
});

describe("getStringArg", () => {
  it("returns value when flag is present", () => {
    expect(getStringArg(["--name", "MyBook"], "--name", "default")).toBe("MyBook");
  });

  it("returns default when flag is missing", () => {
    expect(getStringArg(["--other", "value"], "--name", "default")).toBe("default");
  });

  it("returns default when flag has no value", () => {
    expect(getStringArg(["--name"], "--name", "default")).toBe("default");
  });

  it("returns default when value looks like a flag", () => {
    expect(getStringArg(["--name", "--other"], "--name", "default")).toBe("default");
  });

  it("handles flag in middle of args", () => {
    expect(getStringArg(["url", "--name", "Book", "--wait", "1000"], "--name", "default")).toBe("Book");
  });

  it("returns last value when flag appears multiple times", () => {
    expect(getStringArg(["--name", "First", "--name", "Second"], "--name", "default")).toBe("Second");
  });
});

describe("getNullableStringArg", () => {
  it("returns value when flag is present", () => {
    expect(getNullableStringArg(["--pattern", "*.html"], "--pattern")).toBe("*.html");
  });

  it("returns null when flag is missing", () => {
    expect(getNullableStringArg(["--other", "value"], "--pattern")).toBeNull();
  });

  it("returns null when flag has no value", () => {
    expect(getNullableStringArg(["--pattern"], "--pattern")).toBeNull();
  });
});

describe("getNumberArg", () => {
  it("returns parsed number when flag is present", () => {
    expect(getNumberArg(["--wait", "2000"], "--wait", 1000)).toBe(2000);
  });

  it("returns default when flag is missing", () => {
    expect(getNumberArg(["--other", "500"], "--wait", 1000)).toBe(1000);
  });

  it("returns default when value is not a number", () => {
    expect(getNumberArg(["--wait", "abc"], "--wait", 1000)).toBe(1000);
  });

  it("returns default when flag has no value", () => {
    expect(getNumberArg(["--wait"], "--wait", 1000)).toBe(1000);
  });

  it("handles zero as valid value", () => {
    expect(getNumberArg(["--wait", "0"], "--wait", 1000)).toBe(0);
  });
});

describe("getMultiStringArg", () => {
  it("returns empty array when flag is missing", () => {
    expect(getMultiStringArg(["--other", "value"], "--skip")).toEqual([]);
  });

  it("returns single value", () => {
    expect(getMultiStringArg(["--skip", "url1"], "--skip")).toEqual(["url1"]);
  });

  it("returns multiple values", () => {
    expect(getMultiStringArg(["--skip", "url1", "--skip", "url2"], "--skip")).toEqual(["url1", "url2"]);
  });

  it("ignores flags without values", () => {
    expect(getMultiStringArg(["--skip", "--other"], "--skip")).toEqual([]);
  });

  it("handles mixed args", () => {
    expect(getMultiStringArg(["url", "--skip", "a", "--wait", "1000", "--skip", "b"], "--skip")).toEqual(["a", "b"]);
  });
});

describe("getPositionalArg", () => {
  it("returns first non-flag argument", () => {
    expect(getPositionalArg(["https://example.com"])).toBe("https://example.com");
  });

  it("returns empty string when no positional arg", () => {
    expect(getPositionalArg(["--help"])).toBe("");
    expect(getPositionalArg([])).toBe("");
  });

  it("skips values of known flags", () => {
    expect(getPositionalArg(["--wait", "1000", "https://example.com"], ["--wait"])).toBe("https://example.com");
  });

  it("skips multiple known flag values", () => {
    expect(getPositionalArg(["--wait", "1000", "--delay", "500", "https://example.com"], ["--wait", "--delay"])).toBe(
      "https://example.com",
    );
  });

  it("returns first positional even if not URL", () => {
    expect(getPositionalArg(["positional", "--flag"])).toBe("positional");
  });

  it("skips short flags", () => {
    expect(getPositionalArg(["-h", "positional"])).toBe("positional");
  });

  it("handles positional before flags", () => {
    expect(getPositionalArg(["https://example.com", "--wait", "1000"], ["--wait"])).toBe("https://example.com");
  });
});

describe("getPositionalArgs", () => {
  it("returns every positional argument in order", () => {
    expect(
      getPositionalArgs(["https://a.example/1", "--wait", "500", "https://a.example/2", "--browser"], ["--wait"]),
    ).toEqual(["https://a.example/1", "https://a.example/2"]);
  });

  it("returns an empty array when there are none", () => {
    expect(getPositionalArgs(["--browser", "-h"])).toEqual([]);
  });
});

describe("hasFlag", () => {
  it("detects a boolean flag", () => {
    expect(hasFlag(["url", "--browser"], "--browser")).toBe(true);
    expect(hasFlag(["url"], "--browser")).toBe(false);
  });
});

describe("formatDuration", () => {
  it("formats seconds only", () => {
    expect(formatDuration(0)).toBe("0s");
    expect(formatDuration(59999)).toBe("59s");
  });

  it("formats minutes and seconds", () => {
    expect(formatDuration(65000)).toBe("1m 5s");
    expect(formatDuration(600000)).toBe("10m 0s");
  });
});

describe("delay", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the given time", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = delay(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });
});

describe("validateBook", () => {
  const validBook = {
    title: "Admin Guide",
    description: null,
    url: "https://learn.example.com/book",
    scrapedAt: "2024-01-01T00:00:00.000Z",
    cancelled: false,
    totals: { chapterCount: 1, articleCount: 2, imageCount: 0 },
    chapters: [
      {
        number: 1,
        title: "Basics",
        articles: [
          {
            number: 1,
            title: "Welcome",
            url: "https://learn.example.com/welcome",
            content: { blocks: [], rawText: "" },
            images: [],
            metadata: {},
          },
          {
            number: 2,
            title: "Setup",
            url: "https://learn.example.com/setup",
            error: "HTTP 500 Internal Server Error",
          },
        ],
      },
    ],
  };

  it("accepts a book with scraped and failed articles", () => {
    expect(validateBook(validBook)).toEqual({ isValid: true });
    expect(isBook(validBook)).toBe(true);
  });

  it("accepts a book with no chapters", () => {
    expect(validateBook({ ...validBook, chapters: [] })).toEqual({ isValid: true });
  });

  it("rejects null or non-object", () => {
    expect(validateBook(null)).toEqual({ isValid: false, error: "book.json must be an object" });
    expect(validateBook([])).toEqual({ isValid: false, error: "book.json must be an object" });
    expect(isBook("book")).toBe(false);
  });

  it("reports a failed scrape", () => {
    const failure = {
      error: "Error processing book: HTTP 404 Not Found",
      url: "https://learn.example.com/book",
      scrapedAt: "2024-01-01T00:00:00.000Z",
    };
    expect(validateBook(failure)).toEqual({
      isValid: false,
      error: "book.json holds a failed scrape: Error processing book: HTTP 404 Not Found",
    });
  });

  it("rejects missing string fields", () => {
    const { scrapedAt: _omitted, ...rest } = validBook;
    expect(validateBook(rest)).toEqual({
      isValid: false,
      error: "Missing or invalid field: scrapedAt (expected string)",
    });
  });

  it("rejects chapters that is not an array", () => {
    expect(validateBook({ ...validBook, chapters: {} })).toEqual({
      isValid: false,
      error: "Missing or invalid field: chapters (expected array)",
    });
  });

  it("rejects missing totals", () => {
    expect(validateBook({ ...validBook, totals: null })).toEqual({
      isValid: false,
      error: "Missing or invalid field: totals (expected object)",
    });
  });

  it("reports the index of an invalid chapter", () => {
    const chapters = [validBook.chapters[0], { number: "2", title: "Later", articles: [] }];
    expect(validateBook({ ...validBook, chapters })).toEqual({
      isValid: false,
      error: "chapters[1].number must be a number",
    });
  });

  it("rejects an article with neither content nor error", () => {
    const chapters = [{ number: 1, title: "Basics", articles: [{ title: "Welcome", url: "https://x.example/a" }] }];
    expect(validateBook({ ...validBook, chapters })).toEqual({
      isValid: false,
      error: "chapters[0].articles[0] must have content and metadata, or an error",
    });
  });
});
