/**
 * Turn an article's content region into typed blocks and image references
 */

import { type ElementRule, collectText, directListItems, elementText, findByRules, resolveUrl, tagOf } from "./dom.js";
import type { ContentBlock, StructuredContent } from "./types.js";

/** Candidate containers for an article body, most specific first */
export const CONTENT_AREA_RULES: readonly ElementRule[] = [
  { tag: "article" },
  { tag: "div", attrs: { class: /content|article|main|body/i } },
  { tag: "main" },
  { tag: "div", attrs: { id: /content|article|main/i } },
  { tag: "section", attrs: { class: /content|article/i } },
];

const BLOCK_SELECTOR = "h1, h2, h3, h4, h5, h6, p, ul, ol, pre, code, blockquote, table";

// Blocks emitted whole; nothing inside them becomes a block of its own
const ATOMIC_BLOCK_SELECTOR = "pre, blockquote, table";

// Inline `code` inside running text stays part of that text
const TEXT_BLOCK_SELECTOR = "p, li, h1, h2, h3, h4, h5, h6";

// Captions longer than this are body text, not captions
const MAX_CAPTION_LENGTH = 200;

/** Image reference found in a content region, before download */
export interface DiscoveredImage {
  /** One-based position among all `img` elements of the region */
  index: number;
  sourceUrl: string;
  altText: string | null;
  title: string | null;
  caption: string | null;
}

/**
 * Locate the main content region of an article page.
 *
 * @param document - Parsed article page
 * @returns Content container, the body as fallback, or null for a bodiless document
 */
export function findContentArea(document: Document): Element | null {
  return findByRules(document, CONTENT_AREA_RULES) ?? document.body;
}

/**
 * Get a code block's language from its class, or from a nested `code` element's.
 */
function codeLanguage(element: Element): string | null {
  const source = element.classList.length > 0 ? element : element.querySelector("code");
  const first = source?.classList.item(0);
  if (!first) return null;
  return first.replace(/^(?:language|lang)-/, "") || null;
}

function toBlock(element: Element, text: string): ContentBlock | null {
  const tag = tagOf(element);

  switch (tag) {
    case "h1":
    case "h2":
    case "h3":
    case "h4":
    case "h5":
    case "h6":
      return { type: "heading", level: headingLevel(tag), text };
    case "p":
      return { type: "paragraph", text };
    case "ul":
    case "ol":
      return {
        type: "list",
        ordered: tag === "ol",
        items: directListItems(element)
          .map((item) => elementText(item))
          .filter(Boolean),
      };
    case "pre":
    case "code":
      return { type: "code", text: element.textContent ?? "", language: codeLanguage(element) };
    case "blockquote":
      return { type: "quote", text };
    case "table":
      return { type: "table", rawMarkup: element.outerHTML, text };
    default:
      return null;
  }
}

function headingLevel(tag: "h1" | "h2" | "h3" | "h4" | "h5" | "h6"): 1 | 2 | 3 | 4 | 5 | 6 {
  switch (tag) {
    case "h1":
      return 1;
    case "h2":
      return 2;
    case "h3":
      return 3;
    case "h4":
      return 4;
    case "h5":
      return 5;
    case "h6":
      return 6;
  }
}

/**
 * Walk a content region in document order and emit one block per non-empty
 * block-level element.
 *
 * @param root - Content region
 * @returns Blocks plus the region's space-joined text
 */
export function structureContent(root: Element): StructuredContent {
  const blocks: ContentBlock[] = [];

  for (const element of root.querySelectorAll(BLOCK_SELECTOR)) {
    const atomicAncestor = element.parentElement?.closest(ATOMIC_BLOCK_SELECTOR);
    if (atomicAncestor && root.contains(atomicAncestor)) continue;
    if (tagOf(element) === "code" && element.parentElement?.closest(TEXT_BLOCK_SELECTOR)) continue;

    const text = elementText(element);
    if (!text) continue;

    const block = toBlock(element, text);
    if (block) blocks.push(block);
  }

  return { blocks, rawText: collectText(root) };
}

/**
 * Find a caption for an image: a `figcaption` of its figure, or a short
 * text element right after it.
 */
function findCaption(image: Element): string | null {
  const parent = image.parentElement;
  if (parent && tagOf(parent) === "figure") {
    const caption = elementText(parent.querySelector("figcaption"));
    if (caption) return caption;
  }

  const next = image.nextElementSibling;
  if (next && ["p", "div", "span"].includes(tagOf(next))) {
    const text = elementText(next);
    if (text && text.length < MAX_CAPTION_LENGTH) return text;
  }

  return null;
}

/**
 * List the images of a content region with absolute URLs.
 * Images without `src` or `data-src` are skipped but keep their index slot.
 *
 * @param root - Content region
 * @param baseUrl - URL of the article page
 * @returns Images in document order
 */
export function collectImages(root: Element, baseUrl: string): DiscoveredImage[] {
  const images: DiscoveredImage[] = [];

  root.querySelectorAll("img").forEach((img, position) => {
    const src = img.getAttribute("src") || img.getAttribute("data-src");
    if (!src) return;

    const sourceUrl = resolveUrl(src, baseUrl);
    if (!sourceUrl) return;

    images.push({
      index: position + 1,
      sourceUrl,
      altText: img.getAttribute("alt") || null,
      title: img.getAttribute("title") || null,
      caption: findCaption(img),
    });
  });

  return images;
}
