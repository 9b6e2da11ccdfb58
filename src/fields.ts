/**
 * Heuristic field extraction.
 *
 * Field locators are data: ordered rule tables evaluated until one yields a
 * non-empty value. Site-specific rules (exact attribute values) sit at the
 * top of each table, class-name regex fallbacks below them.
 */

import { type ElementRule, directListItems, elementText, findFirst, nextInDocument, tagOf } from "./dom.js";

/** Where a rule reads its value from */
export type ValueSource = "text" | { attribute: string };

/** One step of a field's fallback chain */
export interface FieldRule extends ElementRule {
  /** Sources tried in order on the located element (default: text, or `content` for meta) */
  read?: ValueSource[];
  /** Normalise the value; returning null makes the chain move on */
  transform?: (value: string) => string | null;
}

/**
 * Run a rule chain against a document or element.
 * Only the first element each rule locates is read.
 *
 * @param root - Document or element to search
 * @param rules - Rules in priority order
 * @returns First non-empty value, or null when every rule misses
 */
export function extractField(root: Document | Element, rules: readonly FieldRule[]): string | null {
  for (const rule of rules) {
    const element = findFirst(root, rule);
    if (!element) continue;

    const sources: ValueSource[] = rule.read ?? (rule.tag === "meta" ? [{ attribute: "content" }] : ["text"]);
    for (const source of sources) {
      const raw = source === "text" ? elementText(element) : (element.getAttribute(source.attribute) ?? "").trim();
      if (!raw) continue;
      const value = rule.transform ? rule.transform(raw) : raw;
      if (value) return value;
    }
  }
  return null;
}

// ============================================================================
// Keyword harvest
// ============================================================================

/** Elements that may introduce a section */
const SECTION_HEADER_SELECTOR = "h2, h3, h4, strong, b, p";

/** Elements that may hold a section's body */
const SECTION_BODY_TAGS = ["ul", "ol", "div", "p"];

/** Keywords that mark the header of each multi-value section */
export const SECTION_KEYWORDS = {
  requirements: ["requirement", "qualification", "must have", "essential", "you will have", "you'll have"],
  responsibilities: ["responsibilit", "duties", "you will", "role", "day to day", "what you'll do"],
  benefits: ["benefit", "perk", "we offer", "what we offer", "why join"],
  skills: ["skill", "technical", "competenc", "experience with"],
} as const satisfies Record<string, readonly string[]>;

export type SectionName = keyof typeof SECTION_KEYWORDS;

/**
 * Collect the items of every section whose header mentions a keyword.
 *
 * Each qualifying header contributes the next list or block after it: the
 * list's direct items, or the block's text when the header does not already
 * contain it. Items from all headers are concatenated in document order
 * without deduplication.
 *
 * @param root - Document or element to scan
 * @param keywords - Lower-case keywords identifying the section
 * @returns Items in document order (possibly empty)
 */
export function harvestSection(root: Document | Element, keywords: readonly string[]): string[] {
  const items: string[] = [];

  for (const header of root.querySelectorAll(SECTION_HEADER_SELECTOR)) {
    const headerText = elementText(header).toLowerCase();
    if (!keywords.some((keyword) => headerText.includes(keyword))) continue;

    const body = nextInDocument(header, SECTION_BODY_TAGS);
    if (!body) continue;

    const tag = tagOf(body);
    if (tag === "ul" || tag === "ol") {
      for (const item of directListItems(body)) {
        const text = elementText(item);
        if (text) items.push(text);
      }
    } else {
      const text = elementText(body);
      if (text && !headerText.includes(text.toLowerCase())) items.push(text);
    }
  }

  return items;
}

// ============================================================================
// Single-shot regex extractors
// ============================================================================

/** Currency amount or range with an optional pay period */
export const SALARY_PATTERN =
  /\$[\d,]+(?:\s*-\s*\$[\d,]+)?(?:\s*(?:per|\/|\+)\s*(?:year|hour|month|annum))?/i;

const EXPERIENCE_LEVELS: ReadonlyArray<[string, RegExp]> = [
  ["entry level", /\b(?:entry[- ]level|junior|graduate|0-2 years|early career)\b/i],
  ["mid level", /\b(?:mid[- ]level|intermediate|2-5 years)\b/i],
  ["senior level", /\b(?:senior|lead|5\+ years|experienced)\b/i],
  ["executive", /\b(?:executive|director|c-level|vp)\b/i],
];

const EDUCATION_PATTERN = /\b(?:bachelor|master|phd|mba|associate|diploma|degree)(?:'s)?\s+(?:degree|in|of)?\s+[^\n.]+/i;

const DEADLINE_PATTERN = /(?:deadline|apply by|closes on)[:\s]+([^\n]+)/i;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;

// Australian landline and mobile numbers
const PHONE_PATTERN = /\b(?:\+?61|0)[2-478](?:[ -]?[0-9]){8}\b/;

/** Employment types recognised in page text, in priority order */
export const JOB_TYPES = [
  "full-time",
  "part-time",
  "contract",
  "temporary",
  "internship",
  "freelance",
  "casual",
  "permanent",
] as const;

const REMOTE_KEYWORDS = ["remote", "work from home", "wfh", "telecommute", "virtual", "hybrid", "flexible location"];

/**
 * Capitalise the first letter of every word ('full-time' → 'Full-Time').
 */
export function titleCase(value: string): string {
  return value.replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}

/**
 * Find the first salary-like amount in free text.
 *
 * @example
 * extractSalaryFromText('Pay: $80,000 - $95,000 per year') // '$80,000 - $95,000 per year'
 */
export function extractSalaryFromText(text: string): string | null {
  return text.match(SALARY_PATTERN)?.[0] ?? null;
}

/**
 * Classify the required experience from the first matching level pattern.
 */
export function extractExperienceLevel(text: string): string | null {
  for (const [level, pattern] of EXPERIENCE_LEVELS) {
    if (pattern.test(text)) return titleCase(level);
  }
  return null;
}

export function extractEducation(text: string): string | null {
  return text.match(EDUCATION_PATTERN)?.[0].trim() ?? null;
}

/**
 * Get the rest of the line after a deadline label.
 */
export function extractDeadline(text: string): string | null {
  const match = text.match(DEADLINE_PATTERN);
  return match?.[1] ? match[1].trim() : null;
}

export function extractEmail(text: string): string | null {
  return text.match(EMAIL_PATTERN)?.[0] ?? null;
}

export function extractPhone(text: string): string | null {
  return text.match(PHONE_PATTERN)?.[0] ?? null;
}

/**
 * Find the first known employment type mentioned in a text.
 *
 * @returns Title-cased type (e.g. 'Full-Time'), or null
 */
export function detectJobType(text: string): string | null {
  const lower = text.toLowerCase();
  const found = JOB_TYPES.find((jobType) => lower.includes(jobType));
  return found ? titleCase(found) : null;
}

export function detectRemote(text: string): boolean {
  const lower = text.toLowerCase();
  return REMOTE_KEYWORDS.some((keyword) => lower.includes(keyword));
}
