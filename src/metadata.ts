/**
 * Derived reading metadata for scraped articles
 */

import type { ArticleMetadata, ContentBlock, Difficulty, StructuredContent } from "./types.js";

/** Average reading speed used for reading-time estimates */
export const WORDS_PER_MINUTE = 200;

/** Articles shorter than this are easy */
export const EASY_WORD_LIMIT = 300;

/** Articles longer than this are hard */
export const HARD_WORD_LIMIT = 1000;

/** Day offsets for spaced review, the same for every article */
export const REVIEW_INTERVALS_DAYS: readonly number[] = [1, 3, 7, 14, 30, 60, 120];

/**
 * Get the readable text of one block. Lists contribute every item;
 * tables their cell text, not their markup.
 */
export function blockText(block: ContentBlock): string {
  return block.type === "list" ? block.items.join(" ") : block.text;
}

/**
 * Count whitespace-delimited tokens.
 *
 * @example
 * countWords('  two\nwords ') // 2
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Estimate whole minutes of reading, never less than one.
 *
 * @example
 * readingTimeMinutes(950) // 4
 */
export function readingTimeMinutes(wordCount: number): number {
  return Math.max(1, Math.floor(wordCount / WORDS_PER_MINUTE));
}

export function estimateDifficulty(wordCount: number): Difficulty {
  if (wordCount < EASY_WORD_LIMIT) return "easy";
  if (wordCount > HARD_WORD_LIMIT) return "hard";
  return "medium";
}

/**
 * Compute metadata for an article's content. Words are counted over the
 * block text; content without blocks falls back to its raw text.
 *
 * @param content - Structured article content
 * @returns Word count, reading time, difficulty and review intervals
 */
export function computeMetadata(content: StructuredContent): ArticleMetadata {
  const text = content.blocks.length > 0 ? content.blocks.map(blockText).join(" ") : content.rawText;
  const wordCount = countWords(text);

  return {
    wordCount,
    readingTimeMinutes: readingTimeMinutes(wordCount),
    difficulty: estimateDifficulty(wordCount),
    reviewIntervalsDays: [...REVIEW_INTERVALS_DAYS],
  };
}
