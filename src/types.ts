/**
 * Shared type definitions for the scrapers
 */

/** One block of article content, in document order */
export type ContentBlock =
  | { type: "heading"; level: 1 | 2 | 3 | 4 | 5 | 6; text: string }
  | { type: "paragraph"; text: string }
  | { type: "list"; ordered: boolean; items: string[] }
  | { type: "code"; text: string; language: string | null }
  | { type: "quote"; text: string }
  | { type: "table"; rawMarkup: string; text: string };

/** Structured content of a page region */
export interface StructuredContent {
  /** Typed blocks in document order; empty elements are excluded */
  blocks: ContentBlock[];
  /** Every text node of the region joined by single spaces */
  rawText: string;
}

/** Node of the discovered table of contents */
export interface TocEntry {
  title: string;
  /** Absolute URL; null for chapter headings that carry no link */
  url: string | null;
  children: TocEntry[];
}

/** Image referenced by an article */
export interface Image {
  /** Absolute URL the image was referenced by */
  sourceUrl: string;
  /** Local file path, or null when the download failed */
  localPath: string | null;
  altText: string | null;
  title: string | null;
  caption: string | null;
}

export type Difficulty = "easy" | "medium" | "hard";

/** Derived reading metadata attached to every scraped article */
export interface ArticleMetadata {
  wordCount: number;
  readingTimeMinutes: number;
  difficulty: Difficulty;
  /** Day offsets for spaced review */
  reviewIntervalsDays: number[];
}

/** Successfully scraped article */
export interface Article {
  /** One-based position within its chapter */
  number: number;
  title: string;
  url: string;
  content: StructuredContent;
  images: Image[];
  metadata: ArticleMetadata;
}

/** Article whose page could not be fetched or parsed */
export interface FailedArticle {
  number: number;
  title: string;
  url: string;
  error: string;
}

export type ArticleEntry = Article | FailedArticle;

export interface Chapter {
  /** One-based chapter number in TOC order */
  number: number;
  title: string;
  articles: ArticleEntry[];
}

export interface BookTotals {
  chapterCount: number;
  articleCount: number;
  imageCount: number;
}

/** A crawled book, stored as book.json */
export interface Book {
  title: string;
  description: string | null;
  url: string;
  /** ISO timestamp when scraping was performed */
  scrapedAt: string;
  /** True when the crawl was stopped before every article was visited */
  cancelled: boolean;
  chapters: Chapter[];
  totals: BookTotals;
}

export interface ContactInfo {
  email: string | null;
  phone: string | null;
}

/** Structured job posting */
export interface JobPosting {
  url: string;
  scrapedAt: string;
  /** Site the posting was recognised as, when a site profile matched */
  source: string | null;
  title: string | null;
  company: string | null;
  location: string | null;
  salary: string | null;
  jobType: string | null;
  postedDate: string | null;
  deadline: string | null;
  experienceLevel: string | null;
  education: string | null;
  remote: boolean;
  description: StructuredContent | null;
  requirements: string[];
  responsibilities: string[];
  benefits: string[];
  skills: string[];
  contactInfo: ContactInfo;
  rawText: string;
}

/**
 * Narrow an article entry to a failed one.
 *
 * @param article - Article entry from a chapter
 * @returns True when the entry carries an error instead of content
 */
export function isFailedArticle(article: ArticleEntry): article is FailedArticle {
  return "error" in article;
}
