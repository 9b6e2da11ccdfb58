/**
 * Merge a scraped book into a single markdown document and learning units
 *
 * Usage: npm run merge [-- --input output/book.json --output output --name "Book Title"]
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ParseError, errorMessage } from './errors.js';
import { buildLearningPack, renderBlocks } from './learning.js';
import { type Article, type Book, type Chapter, type Image, isFailedArticle } from './types.js';
import {
  generateAnchor,
  getNullableStringArg,
  getStringArg,
  hasHelpFlag,
  isBook,
  setupSignalHandlers,
  validateBook,
} from './utils.js';

const DEFAULT_OUTPUT_DIR = 'output';
const DEFAULT_INPUT_FILE = path.join(DEFAULT_OUTPUT_DIR, 'book.json');

export interface MergeOptions {
  input: string;
  outputDir: string;
  /** Title for the document; the scraped book title when null */
  name: string | null;
  showHelp: boolean;
}

/**
 * Print usage information for the merge command.
 */
function showUsage(): void {
  console.log('Usage: npm run merge [-- --input output/book.json --output output --name "Book Title"]');
  console.log('');
  console.log('Merge a scraped book into book.md with a TOC, plus learning-units.json.');
  console.log('');
  console.log('Options:');
  console.log('  --input <file>       Scraped book (default: output/book.json)');
  console.log('  --output <dir>       Output directory (default: output)');
  console.log('  --name <title>       Book title for the document (default: scraped title)');
  console.log('  --help, -h           Show this help message');
  console.log('');
  console.log('Example:');
  console.log('  npm run merge -- --name "My Book Title"');
}

/**
 * Parse command line arguments for the merge command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): MergeOptions {
  return {
    input: getStringArg(args, '--input', DEFAULT_INPUT_FILE),
    outputDir: getStringArg(args, '--output', DEFAULT_OUTPUT_DIR),
    name: getNullableStringArg(args, '--name'),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Get an image's path as referenced from a document in `outputDir`.
 * Images that were not downloaded keep their source URL.
 *
 * @example
 * imagePath({ localPath: 'output/images/ch1_art1_img1.png', ... }, 'output') // './images/ch1_art1_img1.png'
 */
export function imagePath(image: Image, outputDir: string): string {
  if (!image.localPath) return image.sourceUrl;
  const relative = path.relative(outputDir, image.localPath).split(path.sep).join('/');
  return relative.startsWith('.') ? relative : `./${relative}`;
}

/**
 * Generate a table of contents entry for a chapter.
 * Creates a numbered markdown link with proper anchor.
 *
 * @param chapter - Chapter of the book
 * @returns Formatted TOC entry (e.g., '1. [Introduction](#introduction)')
 */
export function generateTocEntry(chapter: Chapter): string {
  const anchor = generateAnchor(chapter.title);
  return `${chapter.number}. [${chapter.title}](#${anchor})`;
}

function renderArticle(article: Article, outputDir: string): string[] {
  const parts = [`### ${article.title}\n`, renderBlocks(article.content.blocks).trim()];

  for (const image of article.images) {
    parts.push(`\n![${image.altText ?? ''}](${imagePath(image, outputDir)})`);
    if (image.caption) parts.push(`*${image.caption}*`);
  }

  return parts;
}

/**
 * Render a book as one markdown document: title page, table of contents,
 * then every chapter with its articles and images.
 *
 * @param book - Scraped book
 * @param options - Document title and the directory the document is written to
 * @returns Markdown document
 */
export function renderBookMarkdown(book: Book, options: { name: string | null; outputDir: string }): string {
  const parts: string[] = [];

  // Add a title page with metadata
  parts.push(`# ${options.name ?? book.title}\n`);
  if (book.description) parts.push(`${book.description}\n`);
  parts.push(`Scraped from: ${book.url}`);
  parts.push(`Date: ${new Date(book.scrapedAt).toLocaleDateString()}`);
  parts.push(`Chapters: ${book.totals.chapterCount}`);
  parts.push(`Articles: ${book.totals.articleCount}`);
  parts.push('\n---\n');

  // Add table of contents
  parts.push('## Table of Contents\n');
  for (const chapter of book.chapters) {
    parts.push(generateTocEntry(chapter));
  }
  parts.push('\n---\n');

  for (const chapter of book.chapters) {
    parts.push(`## ${chapter.title}\n`);
    for (const article of chapter.articles) {
      if (isFailedArticle(article)) {
        parts.push(`### ${article.title}\n`, `> Not available: ${article.error}`);
      } else {
        parts.push(...renderArticle(article, options.outputDir));
      }
      parts.push('');
    }
    parts.push('\n---\n'); // Page break between chapters
  }

  return parts.join('\n');
}

/**
 * Read and validate a scraped book.
 *
 * @param input - Path to book.json
 * @throws {ParseError} When the file is not JSON or not a successful book
 */
export async function readBook(input: string): Promise<Book> {
  const content = await fs.readFile(input, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ParseError(`Invalid ${input}: ${errorMessage(error)}`, { cause: error });
  }

  if (!isBook(parsed)) {
    throw new ParseError(`Invalid ${input}: ${validateBook(parsed).error}`);
  }
  return parsed;
}

/**
 * Main entry point for the merge command.
 * Reads book.json, then writes book.md and learning-units.json.
 *
 * @throws Exits with code 1 if book.json is missing, invalid, or has no chapters
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const { input, outputDir, name, showHelp } = parseArgs(args);

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  // Check if book.json exists
  try {
    await fs.access(input);
  } catch {
    console.error(`Error: ${input} not found. Run 'npm run scrape' first.`);
    process.exit(1);
  }

  let parsed: Book;
  try {
    parsed = await readBook(input);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  if (parsed.chapters.length === 0) {
    console.error('Error: No chapters found in book.');
    process.exit(1);
  }

  console.log(`Merging ${parsed.chapters.length} chapters...`);

  await fs.mkdir(outputDir, { recursive: true });

  const bookPath = path.join(outputDir, 'book.md');
  await fs.writeFile(bookPath, renderBookMarkdown(parsed, { name, outputDir }), 'utf-8');

  const pack = buildLearningPack(parsed);
  const unitsPath = path.join(outputDir, 'learning-units.json');
  await fs.writeFile(unitsPath, JSON.stringify(pack, null, 2), 'utf-8');

  const stats = await fs.stat(bookPath);
  const sizeKb = (stats.size / 1024).toFixed(1);

  console.log(`\nMerged document saved to: ${bookPath} (${sizeKb} KB)`);
  console.log(`Learning units saved to: ${unitsPath} (${pack.summary.totalLearningUnits} units)`);
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers('Merge');
  main().catch((error) => {
    console.error('Error:', error);
    process.exit(1);
  });
}
