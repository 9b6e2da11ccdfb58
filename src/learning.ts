/**
 * Flattened learning-unit view of a book: one self-contained unit per article
 */

import TurndownService from "turndown";
import {
  type ArticleMetadata,
  type Book,
  type ContentBlock,
  type Image,
  isFailedArticle,
} from "./types.js";

/** One article merged with its chapter identity */
export interface LearningUnit {
  /** `ch{chapter}_art{article}` */
  id: string;
  chapter: string;
  chapterNumber: number;
  title: string;
  /** Blocks rendered into one display string */
  content: string;
  structuredContent: ContentBlock[];
  images: Image[];
  metadata: ArticleMetadata;
  context: {
    previousChapter: string | null;
    sourceUrl: string;
  };
}

export interface LearningPackSummary {
  totalLearningUnits: number;
  totalChapters: number;
  totalImages: number;
  totalWords: number;
  totalReadingTimeMinutes: number;
}

/** Learning units of a book, stored as learning-units.json */
export interface LearningPack {
  bookTitle: string;
  bookDescription: string | null;
  sourceUrl: string;
  scrapedAt: string;
  learningUnits: LearningUnit[];
  summary: LearningPackSummary;
}

const CELL_TAGS = new Set(["TH", "TD"]);
const ROW_GROUP_TAGS = new Set(["THEAD", "TBODY", "TFOOT"]);

function firstRow(parent: Node): Node | null {
  for (const child of Array.from(parent.childNodes)) {
    if (child.nodeName === "TR") return child;
    if (ROW_GROUP_TAGS.has(child.nodeName)) {
      const row = firstRow(child);
      if (row) return row;
    }
  }
  return null;
}

function isHeaderRow(row: Node): boolean {
  let table = row.parentNode;
  while (table && table.nodeName !== "TABLE") {
    table = table.parentNode;
  }
  return !table || firstRow(table) === row;
}

const markdownConverter = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
});

// Remove script/style elements from conversion
markdownConverter.remove(["script", "style", "noscript", "iframe"]);

markdownConverter.addRule("tableCell", {
  filter: ["th", "td"],
  replacement: (content) => `| ${content.replace(/\n+/g, " ").trim()} `,
});

markdownConverter.addRule("tableRow", {
  filter: "tr",
  replacement: (content, node) => {
    const line = `${content}|\n`;
    if (!isHeaderRow(node)) return line;
    const columns = Array.from(node.childNodes).filter((child) => CELL_TAGS.has(child.nodeName)).length;
    return `${line}|${" --- |".repeat(columns)}\n`;
  },
});

/**
 * Convert a table's markup into a markdown table. The first row is the header.
 *
 * @param rawMarkup - `<table>` outer HTML
 * @returns Markdown table
 */
export function tableToMarkdown(rawMarkup: string): string {
  return markdownConverter.turndown(rawMarkup);
}

function renderBlock(block: ContentBlock): string[] {
  switch (block.type) {
    case "heading":
      return [`\n${"#".repeat(block.level)} ${block.text}\n`];
    case "paragraph":
      return [block.text];
    case "list":
      return block.items.map((item, i) => `${block.ordered ? `${i + 1}.` : "•"} ${item}`);
    case "code":
      return [`\n\`\`\`${block.language ?? ""}\n${block.text}\n\`\`\`\n`];
    case "quote":
      return [`\n> ${block.text}\n`];
    case "table":
      return [`\n${tableToMarkdown(block.rawMarkup)}\n`];
  }
}

/**
 * Render content blocks into one display string.
 *
 * @example
 * renderBlocks([{ type: 'heading', level: 2, text: 'Intro' }, { type: 'paragraph', text: 'Hello' }])
 * // '\n## Intro\n\nHello'
 */
export function renderBlocks(blocks: ContentBlock[]): string {
  return blocks.flatMap(renderBlock).join("\n");
}

/**
 * Build the learning-unit view of a book. Failed articles have no content
 * and produce no unit.
 *
 * @param book - Crawled book
 * @returns Units in book order plus summary totals
 */
export function buildLearningPack(book: Book): LearningPack {
  const learningUnits: LearningUnit[] = [];

  book.chapters.forEach((chapter, i) => {
    const previousChapter = book.chapters[i - 1]?.title ?? null;

    for (const article of chapter.articles) {
      if (isFailedArticle(article)) continue;

      learningUnits.push({
        id: `ch${chapter.number}_art${article.number}`,
        chapter: chapter.title,
        chapterNumber: chapter.number,
        title: article.title,
        content: renderBlocks(article.content.blocks),
        structuredContent: article.content.blocks,
        images: article.images,
        metadata: article.metadata,
        context: { previousChapter, sourceUrl: article.url },
      });
    }
  });

  return {
    bookTitle: book.title,
    bookDescription: book.description,
    sourceUrl: book.url,
    scrapedAt: book.scrapedAt,
    learningUnits,
    summary: {
      totalLearningUnits: learningUnits.length,
      totalChapters: book.totals.chapterCount,
      totalImages: book.totals.imageCount,
      totalWords: learningUnits.reduce((sum, unit) => sum + unit.metadata.wordCount, 0),
      totalReadingTimeMinutes: learningUnits.reduce((sum, unit) => sum + unit.metadata.readingTimeMinutes, 0),
    },
  };
}
