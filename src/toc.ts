/**
 * Discover a book's chapter → article hierarchy from its landing page
 */

import { type ElementRule, attributeMatches, elementText, findByRules, resolveUrl, tagOf } from "./dom.js";
import type { TocEntry } from "./types.js";
import { getBaseUrl } from "./utils.js";

/** Candidate TOC containers, most specific first */
export const TOC_CONTAINER_RULES: readonly ElementRule[] = [
  { tag: "div", attrs: { class: /toc|table.*of.*contents|sidebar|navigation/i } },
  { tag: "nav", attrs: { class: /toc|navigation|sidebar/i } },
  { tag: "aside", attrs: { class: /toc|navigation|sidebar/i } },
  { tag: "ul", attrs: { class: /chapter|article.*list/i } },
];

const CHAPTER_CANDIDATE_SELECTOR = "h2, h3, h4, div, li";
const CHAPTER_CLASS_PATTERN = /chapter|section|heading/i;

/** Title of the synthetic chapter holding every link when no chapters are marked up */
export const FLAT_CHAPTER_TITLE = "Main Content";

/**
 * Locate the element holding the table of contents.
 *
 * @param document - Parsed landing page
 * @returns TOC container; the first nav or aside, or the whole page, as fallbacks
 */
export function findTocContainer(document: Document): Element {
  return (
    findByRules(document, TOC_CONTAINER_RULES) ??
    document.querySelector("nav") ??
    document.querySelector("aside") ??
    document.documentElement
  );
}

function isChapterCandidate(element: Element): boolean {
  return attributeMatches(element, "class", CHAPTER_CLASS_PATTERN);
}

/**
 * Get a chapter heading's own title and link, ignoring any nested article list.
 */
function chapterHeading(heading: Element, baseUrl: string): { title: string; url: string | null } {
  const own = heading.ownerDocument.createElement("div");
  own.append(...Array.from(heading.childNodes, (child) => child.cloneNode(true)));
  for (const list of own.querySelectorAll("ul, ol")) {
    list.remove();
  }

  const href = own.querySelector("a[href]")?.getAttribute("href");
  return { title: elementText(own), url: href ? resolveUrl(href, baseUrl) : null };
}

/**
 * Find the list of article links belonging to a chapter heading:
 * the next sibling when it is a list, otherwise a list nested inside.
 */
function articleListFor(heading: Element): Element | null {
  const next = heading.nextElementSibling;
  if (next && (tagOf(next) === "ul" || tagOf(next) === "ol")) return next;
  return heading.querySelector("ul, ol");
}

/**
 * Turn the links inside an element into article entries.
 *
 * @param links - Anchor elements in document order
 * @param baseUrl - Landing page URL
 * @param accept - Extra filter on the raw href and resolved URL
 * @returns Entries with non-empty titles and resolvable URLs
 */
function linksToArticles(
  links: Iterable<Element>,
  baseUrl: string,
  accept: (href: string, url: string) => boolean = () => true,
): TocEntry[] {
  const articles: TocEntry[] = [];
  for (const link of links) {
    const href = link.getAttribute("href");
    if (!href) continue;
    const url = resolveUrl(href, baseUrl);
    const title = elementText(link);
    if (!url || !title || !accept(href, url)) continue;
    articles.push({ title, url, children: [] });
  }
  return articles;
}

/**
 * Read one chapter candidate: its own title plus the article links of its list.
 */
function candidateChapter(heading: Element, baseUrl: string): TocEntry | null {
  const { title, url } = chapterHeading(heading, baseUrl);
  if (!title) return null;

  const list = articleListFor(heading);
  const articles = list ? linksToArticles(list.querySelectorAll("a[href]"), baseUrl) : [];
  return articles.length > 0 ? { title, url, children: articles } : null;
}

/**
 * Method A: chapter-like headings, each followed by (or containing) a list of article links.
 * A candidate wrapping another candidate that yields articles is a container
 * of chapters, not a chapter.
 */
function chaptersFromHeadings(container: Element, baseUrl: string): TocEntry[] {
  const candidates = Array.from(container.querySelectorAll(CHAPTER_CANDIDATE_SELECTOR)).filter(isChapterCandidate);
  const found = new Map(candidates.map((heading) => [heading, candidateChapter(heading, baseUrl)] as const));

  const chapters: TocEntry[] = [];
  for (const heading of candidates) {
    const chapter = found.get(heading);
    if (!chapter) continue;

    const wrapsChapter = candidates.some(
      (other) => other !== heading && heading.contains(other) && Boolean(found.get(other)),
    );
    if (!wrapsChapter) chapters.push(chapter);
  }

  return chapters;
}

/**
 * Method B: every same-origin, non-fragment link in the container as one chapter.
 */
function flatChapter(container: Element, baseUrl: string): TocEntry[] {
  const origin = getBaseUrl(baseUrl);
  const articles = linksToArticles(
    container.querySelectorAll("a[href]"),
    baseUrl,
    (href, url) => !href.startsWith("#") && getBaseUrl(url) === origin,
  );
  return articles.length > 0 ? [{ title: FLAT_CHAPTER_TITLE, url: null, children: articles }] : [];
}

/**
 * Keep the first entry for each URL, preserving discovery order.
 *
 * @param articles - Article entries of one chapter
 * @returns Entries with duplicate URLs removed
 */
export function dedupeArticles(articles: TocEntry[]): TocEntry[] {
  const seen = new Set<string | null>();
  return articles.filter((article) => {
    if (seen.has(article.url)) return false;
    seen.add(article.url);
    return true;
  });
}

/**
 * Resolve the table of contents of a landing page.
 * An empty result is valid and yields a book without chapters.
 *
 * @param document - Parsed landing page
 * @param baseUrl - URL the page was loaded from
 * @returns Chapters in discovery order, each with at least one article
 */
export function resolveTableOfContents(document: Document, baseUrl: string): TocEntry[] {
  const container = findTocContainer(document);

  let chapters = chaptersFromHeadings(container, baseUrl);
  if (chapters.length === 0) {
    chapters = flatChapter(container, baseUrl);
  }

  return chapters
    .map((chapter) => ({ ...chapter, children: dedupeArticles(chapter.children) }))
    .filter((chapter) => chapter.children.length > 0);
}
