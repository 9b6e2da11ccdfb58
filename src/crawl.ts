/**
 * Crawl a book: landing page → table of contents → article pages → Book
 */

import { AssetDeduplicator, type AssetFetcher, type AssetStore } from "./assets.js";
import { collectImages, findContentArea, structureContent } from "./content.js";
import { type CrawlError, type Result, errorMessage } from "./errors.js";
import type { DocumentFetcher } from "./fetcher.js";
import { type FieldRule, extractField } from "./fields.js";
import { computeMetadata } from "./metadata.js";
import { resolveTableOfContents } from "./toc.js";
import {
  type Article,
  type ArticleEntry,
  type Book,
  type Chapter,
  type Image,
  type StructuredContent,
  type TocEntry,
  isFailedArticle,
} from "./types.js";
import { delay, globToRegex } from "./utils.js";

/** Lifecycle of one crawl; `failed` is only reachable from `fetching-root` */
export type CrawlState = "init" | "fetching-root" | "resolving-toc" | "crawling" | "aggregating" | "done" | "failed";

// Default timing values (in ms)
export const DEFAULT_PAGE_WAIT = 1000; // Wait after page load for JS rendering
export const DEFAULT_ARTICLE_DELAY = 1000; // Pause between article fetches of one worker

export const DEFAULT_BOOK_TITLE = "Untitled Book";

/** Hosting-site suffixes trimmed from page titles ("Guide - Zoho Learn" → "Guide") */
export const SITE_TITLE_SUFFIXES: readonly RegExp[] = [/\s*-\s*Zoho\s+Learn.*$/i];

function stripSiteSuffix(title: string): string | null {
  const stripped = SITE_TITLE_SUFFIXES.reduce((value, suffix) => value.replace(suffix, ""), title).trim();
  return stripped || null;
}

export const BOOK_TITLE_RULES: readonly FieldRule[] = [
  { tag: "h1", attrs: { class: /book.*title|title/i }, transform: stripSiteSuffix },
  { tag: "h1", transform: stripSiteSuffix },
  { tag: "title", transform: stripSiteSuffix },
  { tag: "meta", attrs: { property: "og:title" }, transform: stripSiteSuffix },
];

export const BOOK_DESCRIPTION_RULES: readonly FieldRule[] = [
  { tag: "meta", attrs: { name: "description" } },
  { tag: "meta", attrs: { property: "og:description" } },
  { tag: "div", attrs: { class: /description|summary/i } },
  { tag: "p", attrs: { class: /description|summary/i } },
];

/** Progress of the article phase, reported after each article */
export interface CrawlProgress {
  /** Articles finished so far, failures included */
  completed: number;
  total: number;
  title: string;
  url: string;
  failed: boolean;
}

/** Configuration options for a crawl */
export interface CrawlOptions {
  /** Wait hint passed to the fetcher for every page (ms) */
  pageWait?: number;
  /** Politeness delay between successive article fetches of one worker (ms) */
  articleDelay?: number;
  /** Number of articles fetched at once */
  concurrency?: number;
  /** Stops scheduling further articles once aborted */
  signal?: AbortSignal;
  /** Clock for `scrapedAt` */
  now?: () => Date;
  /** Skip articles whose URL contains any of these */
  skipUrls?: string[];
  /** Only crawl articles whose URL matches this glob */
  urlPattern?: string | null;
  onProgress?: (progress: CrawlProgress) => void;
}

/** One article of the work list with its TOC position */
interface ArticleTask {
  chapterIndex: number;
  articleIndex: number;
  chapterNumber: number;
  articleNumber: number;
  title: string;
  url: string;
}

/**
 * Keep the articles that pass the skip list and URL pattern.
 */
export function filterArticles(articles: TocEntry[], skipUrls: string[], urlPattern: string | null): TocEntry[] {
  const regex = urlPattern ? globToRegex(urlPattern) : null;
  return articles.filter((article) => {
    const url = article.url;
    if (!url) return false;
    if (skipUrls.some((skip) => url.includes(skip))) return false;
    return regex ? regex.test(url) : true;
  });
}

/**
 * Runs one crawl. Articles are processed from an ordered work list; results
 * land in slots indexed by TOC position, so completion order never decides
 * output order.
 */
export class CrawlOrchestrator {
  private current: CrawlState = "init";
  private readonly pageWait: number;
  private readonly articleDelay: number;
  private readonly concurrency: number;
  private readonly now: () => Date;

  constructor(
    private readonly fetcher: DocumentFetcher,
    private readonly assets: AssetDeduplicator,
    private readonly options: CrawlOptions = {},
  ) {
    this.pageWait = options.pageWait ?? DEFAULT_PAGE_WAIT;
    this.articleDelay = options.articleDelay ?? DEFAULT_ARTICLE_DELAY;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.now = options.now ?? (() => new Date());
  }

  get state(): CrawlState {
    return this.current;
  }

  /**
   * Crawl the book behind a landing page.
   *
   * @param url - Landing page holding the table of contents
   * @returns The book, or an error record when the landing page cannot be fetched
   */
  async run(url: string): Promise<Result<Book, CrawlError>> {
    if (this.current !== "init") {
      throw new Error(`Crawl already started (state: ${this.current})`);
    }
    const scrapedAt = this.now().toISOString();

    this.current = "fetching-root";
    let root: Document;
    try {
      root = await this.fetcher.fetch(url, this.pageWait);
    } catch (error) {
      this.current = "failed";
      return {
        ok: false,
        error: { kind: "fetch", error: `Error processing book: ${errorMessage(error)}`, url, scrapedAt },
      };
    }

    this.current = "resolving-toc";
    const title = extractField(root, BOOK_TITLE_RULES) ?? DEFAULT_BOOK_TITLE;
    const description = extractField(root, BOOK_DESCRIPTION_RULES);
    const toc = resolveTableOfContents(root, url).map((chapter) => ({
      ...chapter,
      children: filterArticles(chapter.children, this.options.skipUrls ?? [], this.options.urlPattern ?? null),
    }));

    this.current = "crawling";
    const slots = toc.map((chapter) => new Array<ArticleEntry | undefined>(chapter.children.length));
    const cancelled = await this.crawlArticles(this.workList(toc), slots);

    this.current = "aggregating";
    const chapters: Chapter[] = [];
    toc.forEach((entry, i) => {
      const articles = (slots[i] ?? []).filter((article): article is ArticleEntry => article !== undefined);
      if (articles.length > 0) {
        chapters.push({ number: i + 1, title: entry.title, articles });
      }
    });

    const book: Book = {
      title,
      description,
      url,
      scrapedAt,
      cancelled,
      chapters,
      totals: {
        chapterCount: chapters.length,
        articleCount: chapters.reduce((sum, chapter) => sum + chapter.articles.length, 0),
        imageCount: chapters.reduce(
          (sum, chapter) =>
            sum + chapter.articles.reduce((n, article) => n + (isFailedArticle(article) ? 0 : article.images.length), 0),
          0,
        ),
      },
    };

    this.current = "done";
    return { ok: true, value: book };
  }

  private workList(toc: TocEntry[]): ArticleTask[] {
    const tasks: ArticleTask[] = [];
    toc.forEach((chapter, chapterIndex) => {
      chapter.children.forEach((article, articleIndex) => {
        if (!article.url) return;
        tasks.push({
          chapterIndex,
          articleIndex,
          chapterNumber: chapterIndex + 1,
          articleNumber: articleIndex + 1,
          title: article.title,
          url: article.url,
        });
      });
    });
    return tasks;
  }

  /**
   * Process the work list with a pool of workers.
   *
   * @returns True when the crawl was cancelled before every task ran
   */
  private async crawlArticles(tasks: ArticleTask[], slots: (ArticleEntry | undefined)[][]): Promise<boolean> {
    const { signal, onProgress } = this.options;
    let next = 0;
    let completed = 0;

    const spawnWorker = async (): Promise<void> => {
      let fetched = false;
      while (!signal?.aborted) {
        const task = tasks[next++];
        if (!task) break;

        if (fetched) await delay(this.articleDelay);
        if (signal?.aborted) break;
        fetched = true;

        const entry = await this.crawlArticle(task);
        const chapterSlots = slots[task.chapterIndex];
        if (chapterSlots) chapterSlots[task.articleIndex] = entry;

        completed++;
        onProgress?.({
          completed,
          total: tasks.length,
          title: task.title,
          url: task.url,
          failed: isFailedArticle(entry),
        });
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.concurrency, Math.max(tasks.length, 1)); i++) {
      workers.push(spawnWorker());
    }
    await Promise.all(workers);

    return completed < tasks.length;
  }

  /**
   * Fetch one article and build its entry. Any failure on the way becomes a
   * failed entry at the same position.
   */
  private async crawlArticle(task: ArticleTask): Promise<ArticleEntry> {
    const { articleNumber: number, title, url } = task;
    try {
      return await this.buildArticle(task);
    } catch (error) {
      return { number, title, url, error: errorMessage(error) };
    }
  }

  private async buildArticle(task: ArticleTask): Promise<Article> {
    const { articleNumber: number, title, url } = task;
    const document = await this.fetcher.fetch(url, this.pageWait);

    const area = findContentArea(document);
    const content: StructuredContent = area ? structureContent(area) : { blocks: [], rawText: "" };

    const images: Image[] = [];
    for (const image of area ? collectImages(area, url) : []) {
      const localPath = await this.assets.resolve(image.sourceUrl, {
        chapter: task.chapterNumber,
        article: task.articleNumber,
        image: image.index,
      });
      images.push({
        sourceUrl: image.sourceUrl,
        localPath,
        altText: image.altText,
        title: image.title,
        caption: image.caption,
      });
    }

    return { number, title, url, content, images, metadata: computeMetadata(content) };
  }
}

/** Options for a {@link BookScraper} session */
export interface BookScraperOptions extends Omit<CrawlOptions, "signal" | "onProgress"> {
  fetcher: DocumentFetcher;
  assetFetcher: AssetFetcher;
  assetStore: AssetStore;
}

/** Per-call options for {@link BookScraper.scrapeCollection} */
export type CollectionRunOptions = Pick<CrawlOptions, "signal" | "onProgress">;

/**
 * Scraper session. Owns the asset cache shared by every crawl it runs;
 * the cache is discarded on close.
 */
export class BookScraper {
  readonly assets: AssetDeduplicator;
  private readonly fetcher: DocumentFetcher;
  private readonly crawlOptions: CrawlOptions;

  constructor(options: BookScraperOptions) {
    const { fetcher, assetFetcher, assetStore, ...crawlOptions } = options;
    this.fetcher = fetcher;
    this.assets = new AssetDeduplicator(assetFetcher, assetStore);
    this.crawlOptions = crawlOptions;
  }

  /**
   * Crawl one book.
   *
   * @param url - Landing page of the book
   * @param run - Cancellation signal and progress callback for this crawl
   * @returns The book, or an error record when the landing page failed
   */
  scrapeCollection(url: string, run: CollectionRunOptions = {}): Promise<Result<Book, CrawlError>> {
    return new CrawlOrchestrator(this.fetcher, this.assets, { ...this.crawlOptions, ...run }).run(url);
  }

  async close(): Promise<void> {
    this.assets.clear();
    await this.fetcher.close?.();
  }
}
