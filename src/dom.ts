/**
 * DOM helpers shared by the extractors.
 *
 * Pages are parsed with jsdom into a standard DOM Document, so the same
 * querySelector-based code runs against fetched HTML and test fixtures.
 */

import { JSDOM } from "jsdom";

/** Attribute value matcher: a literal for exact match, a RegExp for heuristic match */
export type AttributePattern = string | RegExp;

/** Tag plus attribute constraints locating one kind of element */
export interface ElementRule {
  tag: string;
  attrs?: Record<string, AttributePattern>;
}

/** Elements whose text never counts as page content */
const NON_TEXT_TAGS = new Set(["SCRIPT", "STYLE", "NOSCRIPT", "TEMPLATE"]);

// NodeFilter.SHOW_TEXT; the NodeFilter global only exists inside a window
const SHOW_TEXT = 0x4;

/**
 * Parse an HTML string into a DOM Document.
 *
 * @param html - Page markup
 * @param url - Page URL, used as the document URL when given
 * @returns Parsed document
 */
export function parseDocument(html: string, url?: string): Document {
  return new JSDOM(html, url ? { url } : {}).window.document;
}

/**
 * Get the element's text with whitespace runs collapsed and ends trimmed.
 */
export function elementText(element: Element | null | undefined): string {
  return (element?.textContent ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Join every visible text node under a root with single spaces.
 * Script and style contents are skipped.
 *
 * @param root - Element to collect text from
 * @returns Space-separated text
 */
export function collectText(root: Element): string {
  const walker = root.ownerDocument.createTreeWalker(root, SHOW_TEXT);
  const parts: string[] = [];

  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    const parent = node.parentElement;
    if (parent && NON_TEXT_TAGS.has(parent.tagName)) continue;
    const text = (node.nodeValue ?? "").replace(/\s+/g, " ").trim();
    if (text) parts.push(text);
  }

  return parts.join(" ");
}

/** Elements that start a new line of page text */
const LINE_BREAK_SELECTOR =
  "title, p, div, li, ul, ol, dt, dd, h1, h2, h3, h4, h5, h6, br, tr, td, th, table, section, article, blockquote, pre";

/**
 * Get the text of the whole page one line per block element, whitespace in
 * each line collapsed and empty lines dropped. Regex extractors rely on line
 * breaks to bound their matches.
 *
 * @param document - Parsed page
 * @returns Page text without script and style contents
 */
export function pageText(document: Document): string {
  const clone = document.documentElement.cloneNode(true);
  if (!isElement(clone)) return "";
  for (const el of clone.querySelectorAll("script, style, noscript, template")) {
    el.remove();
  }
  for (const el of clone.querySelectorAll(LINE_BREAK_SELECTOR)) {
    el.before("\n");
    el.after("\n");
  }

  return (clone.textContent ?? "")
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

/**
 * Get readable page text: navigation chrome removed, whitespace collapsed.
 *
 * @param document - Parsed page
 * @returns Space-separated text of the page body
 */
export function readableText(document: Document): string {
  const clone = document.documentElement.cloneNode(true);
  if (!isElement(clone)) return "";
  for (const el of clone.querySelectorAll("nav, footer, header")) {
    el.remove();
  }
  return collectText(clone);
}

/**
 * Check whether a node is an element. Avoids `instanceof`, which fails
 * across jsdom windows.
 */
export function isElement(node: Node | null | undefined): node is Element {
  return node?.nodeType === 1;
}

/**
 * Get an element's lower-case tag name.
 */
export function tagOf(element: Element): string {
  return element.tagName.toLowerCase();
}

/**
 * Test one attribute against a pattern. Literal patterns must match exactly.
 * RegExp patterns on `class` are tried against every class token and the
 * whole attribute value; on other attributes against the whole value.
 *
 * @param element - Element to test
 * @param name - Attribute name
 * @param pattern - Literal or RegExp
 * @returns True when the attribute is present and matches
 */
export function attributeMatches(element: Element, name: string, pattern: AttributePattern): boolean {
  const value = element.getAttribute(name);
  if (value === null) return false;
  if (typeof pattern === "string") return value === pattern;

  const candidates = name === "class" ? [...value.split(/\s+/).filter(Boolean), value] : [value];
  return candidates.some((candidate) => pattern.test(candidate));
}

/**
 * Check an element against a rule's tag and attribute constraints.
 */
export function matchesRule(element: Element, rule: ElementRule): boolean {
  if (tagOf(element) !== rule.tag) return false;
  if (!rule.attrs) return true;
  return Object.entries(rule.attrs).every(([name, pattern]) => attributeMatches(element, name, pattern));
}

/**
 * Find the first element under a root, in document order, matching a rule.
 *
 * @param root - Document or element to search
 * @param rule - Tag and attribute constraints
 * @returns First match, or null
 */
export function findFirst(root: Document | Element, rule: ElementRule): Element | null {
  for (const element of root.querySelectorAll(rule.tag)) {
    if (matchesRule(element, rule)) return element;
  }
  return null;
}

/**
 * Find the first element matching any rule, trying rules in priority order.
 *
 * @param root - Document or element to search
 * @param rules - Rules, most specific first
 * @returns Element located by the first rule that matches, or null
 */
export function findByRules(root: Document | Element, rules: readonly ElementRule[]): Element | null {
  for (const rule of rules) {
    const element = findFirst(root, rule);
    if (element) return element;
  }
  return null;
}

/**
 * Find the first element with one of the given tags that comes after `start`
 * in document order. Descendants of `start` count as following it.
 *
 * @param start - Element to search from
 * @param tags - Lower-case tag names to accept
 * @returns Next matching element in the document, or null
 */
export function nextInDocument(start: Element, tags: readonly string[]): Element | null {
  for (const candidate of start.ownerDocument.querySelectorAll(tags.join(", "))) {
    if (candidate === start) continue;
    if (start.compareDocumentPosition(candidate) & start.DOCUMENT_POSITION_FOLLOWING) {
      return candidate;
    }
  }
  return null;
}

/**
 * Get the direct `li` children of a list element.
 */
export function directListItems(list: Element): Element[] {
  return Array.from(list.children).filter((child) => tagOf(child) === "li");
}

/**
 * Resolve an href against a base URL.
 *
 * @param href - Raw attribute value
 * @param baseUrl - URL of the page the href appeared on
 * @returns Absolute URL, or null when it cannot be resolved
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}
