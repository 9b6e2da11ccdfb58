/**
 * Job posting extraction: one page becomes one flat JobPosting record
 */

import { structureContent } from "./content.js";
import { type ElementRule, findByRules, pageText, readableText } from "./dom.js";
import { type ExtractionError, type Result, errorMessage } from "./errors.js";
import type { DocumentFetcher } from "./fetcher.js";
import {
  type FieldRule,
  SECTION_KEYWORDS,
  detectJobType,
  detectRemote,
  extractDeadline,
  extractEducation,
  extractEmail,
  extractExperienceLevel,
  extractField,
  extractPhone,
  extractSalaryFromText,
  harvestSection,
} from "./fields.js";
import type { JobPosting } from "./types.js";
import { delay } from "./utils.js";

/** Default wait hint for job pages (ms) */
export const DEFAULT_JOB_PAGE_WAIT = 1000;

/** Default pause between pages of a batch (ms) */
export const DEFAULT_JOB_DELAY = 1000;

/** Hosts with a dedicated rule set, mapped to the `source` they report */
export const KNOWN_SOURCES: ReadonlyArray<[RegExp, string]> = [[/(^|\.)seek\.com\.au$/i, "seek.com.au"]];

const JOB_TYPE_CLASS = /job.*type|employment.*type|work.*type/i;
const DESCRIPTION_CLASS = /job.*description|description/i;

/** Scalar fields located by rule chains */
export type JobRuleField = "title" | "company" | "location" | "salary" | "jobType" | "postedDate";

/**
 * Field locators, exact `data-automation` rules first, class-name
 * heuristics after them.
 */
export const JOB_FIELD_RULES: Record<JobRuleField, readonly FieldRule[]> = {
  title: [
    { tag: "h1", attrs: { "data-automation": "job-detail-title" } },
    { tag: "h1", attrs: { class: /job.*title/i } },
    { tag: "h1", attrs: { class: /title/i } },
    { tag: "h1" },
    { tag: "h2", attrs: { class: /job.*title/i } },
    { tag: "meta", attrs: { property: "og:title" } },
    { tag: "title" },
  ],
  company: [
    { tag: "span", attrs: { "data-automation": "advertiser-name" } },
    { tag: "a", attrs: { "data-automation": "company-link" } },
    { tag: "span", attrs: { class: /company/i } },
    { tag: "div", attrs: { class: /company/i } },
    { tag: "a", attrs: { class: /company/i } },
    { tag: "meta", attrs: { property: "og:site_name" } },
  ],
  location: [
    { tag: "span", attrs: { "data-automation": "job-detail-location" } },
    { tag: "a", attrs: { "data-automation": "job-detail-location" } },
    { tag: "span", attrs: { class: /location/i } },
    { tag: "div", attrs: { class: /location/i } },
    { tag: "p", attrs: { class: /location/i } },
  ],
  salary: [
    { tag: "span", attrs: { "data-automation": "job-detail-salary" } },
    { tag: "span", attrs: { class: /salary|compensation|pay/i } },
    { tag: "div", attrs: { class: /salary|compensation|pay/i } },
  ],
  jobType: [
    { tag: "span", attrs: { "data-automation": "job-detail-work-type" } },
    { tag: "span", attrs: { class: JOB_TYPE_CLASS }, transform: detectJobType },
    { tag: "div", attrs: { class: JOB_TYPE_CLASS }, transform: detectJobType },
  ],
  postedDate: [
    { tag: "span", attrs: { "data-automation": "job-detail-date" } },
    { tag: "time", read: [{ attribute: "datetime" }, "text"] },
    { tag: "span", attrs: { class: /date|posted/i } },
    { tag: "div", attrs: { class: /date|posted/i } },
  ],
};

/** Containers whose structured content becomes the description */
export const DESCRIPTION_RULES: readonly ElementRule[] = [
  { tag: "div", attrs: { "data-automation": "jobAdDetails" } },
  { tag: "div", attrs: { class: /job.*details|description/i } },
  { tag: "section", attrs: { class: DESCRIPTION_CLASS } },
  { tag: "div", attrs: { id: DESCRIPTION_CLASS } },
];

/**
 * Get the source label of a posting URL.
 *
 * @returns The recognised site, or null for generic pages
 */
export function detectSource(url: string): string | null {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    return null;
  }
  return KNOWN_SOURCES.find(([pattern]) => pattern.test(host))?.[1] ?? null;
}

/**
 * Extract a job posting from a parsed page. Never throws; fields that
 * cannot be located are null and list fields empty.
 *
 * @param document - Parsed job page
 * @param url - URL the page was loaded from
 * @param scrapedAt - ISO timestamp of the scrape
 * @returns The posting
 */
export function extractJobPosting(document: Document, url: string, scrapedAt: string): JobPosting {
  const text = pageText(document);
  const descriptionArea = findByRules(document, DESCRIPTION_RULES);

  return {
    url,
    scrapedAt,
    source: detectSource(url),
    title: extractField(document, JOB_FIELD_RULES.title),
    company: extractField(document, JOB_FIELD_RULES.company),
    location: extractField(document, JOB_FIELD_RULES.location),
    salary: extractField(document, JOB_FIELD_RULES.salary) ?? extractSalaryFromText(text),
    jobType: extractField(document, JOB_FIELD_RULES.jobType) ?? detectJobType(text),
    postedDate: extractField(document, JOB_FIELD_RULES.postedDate),
    deadline: extractDeadline(text),
    experienceLevel: extractExperienceLevel(text),
    education: extractEducation(text),
    remote: detectRemote(text),
    description: descriptionArea ? structureContent(descriptionArea) : null,
    requirements: harvestSection(document, SECTION_KEYWORDS.requirements),
    responsibilities: harvestSection(document, SECTION_KEYWORDS.responsibilities),
    benefits: harvestSection(document, SECTION_KEYWORDS.benefits),
    skills: harvestSection(document, SECTION_KEYWORDS.skills),
    contactInfo: { email: extractEmail(text), phone: extractPhone(text) },
    rawText: readableText(document),
  };
}

/** Options for {@link JobScraper} */
export interface JobScraperOptions {
  fetcher: DocumentFetcher;
  /** Wait hint passed to the fetcher (ms) */
  pageWait?: number;
  /** Clock for `scrapedAt` */
  now?: () => Date;
}

/** Options for a batch of job pages */
export interface BatchOptions {
  /** Pause between pages (ms) */
  delay?: number;
  /** Stops scheduling further pages once aborted */
  signal?: AbortSignal;
  /** Called after each page with its 1-based position */
  onResult?: (result: Result<JobPosting, ExtractionError>, index: number, total: number) => void;
}

export class JobScraper {
  private readonly fetcher: DocumentFetcher;
  private readonly pageWait: number;
  private readonly now: () => Date;

  constructor(options: JobScraperOptions) {
    this.fetcher = options.fetcher;
    this.pageWait = options.pageWait ?? DEFAULT_JOB_PAGE_WAIT;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scrape one job posting.
   *
   * @param url - Posting page
   * @returns The posting, or an error record when the page cannot be fetched
   */
  async scrape(url: string): Promise<Result<JobPosting, ExtractionError>> {
    const scrapedAt = this.now().toISOString();
    try {
      const document = await this.fetcher.fetch(url, this.pageWait);
      return { ok: true, value: extractJobPosting(document, url, scrapedAt) };
    } catch (error) {
      return {
        ok: false,
        error: { kind: "fetch", error: `Error processing page: ${errorMessage(error)}`, url, scrapedAt },
      };
    }
  }

  /**
   * Scrape several postings one after another with a pause between pages.
   *
   * @param urls - Posting pages, in output order
   * @returns One result per page scraped before any abort
   */
  async scrapeMany(urls: string[], options: BatchOptions = {}): Promise<Result<JobPosting, ExtractionError>[]> {
    const { signal, onResult } = options;
    const pause = options.delay ?? DEFAULT_JOB_DELAY;
    const results: Result<JobPosting, ExtractionError>[] = [];

    for (let i = 0; i < urls.length; i++) {
      const url = urls[i];
      if (signal?.aborted || url === undefined) break;

      const result = await this.scrape(url);
      results.push(result);
      onResult?.(result, i + 1, urls.length);

      if (i < urls.length - 1) {
        await delay(pause);
      }
    }

    return results;
  }

  async close(): Promise<void> {
    await this.fetcher.close?.();
  }
}
