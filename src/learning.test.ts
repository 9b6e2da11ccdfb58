import { describe, expect, it } from "vitest";
import { buildLearningPack, renderBlocks, tableToMarkdown } from "./learning.js";
import type { Article, Book } from "./types.js";

function article(number: number, title: string, words: number): Article {
  return {
    number,
    title,
    url: `https://learn.example.com/${title.toLowerCase()}`,
    content: { blocks: [{ type: "paragraph", text: `${title} text` }], rawText: `${title} text` },
    images: [],
    metadata: {
      wordCount: words,
      readingTimeMinutes: Math.max(1, Math.floor(words / 200)),
      difficulty: "easy",
      reviewIntervalsDays: [1, 3],
    },
  };
}

describe("renderBlocks", () => {
  it("renders headings, paragraphs and bulleted lists", () => {
    expect(
      renderBlocks([
        { type: "heading", level: 2, text: "Intro" },
        { type: "paragraph", text: "Hello" },
        { type: "list", ordered: false, items: ["a", "b"] },
      ]),
    ).toBe("\n## Intro\n\nHello\n• a\n• b");
  });

  it("numbers ordered lists and fences code", () => {
    expect(
      renderBlocks([
        { type: "list", ordered: true, items: ["x", "y"] },
        { type: "code", text: "let a;", language: null },
        { type: "quote", text: "Q" },
      ]),
    ).toBe("1. x\n2. y\n\n```\nlet a;\n```\n\n\n> Q\n");
  });

  it("tags fenced code with its language", () => {
    expect(renderBlocks([{ type: "code", text: "puts 1", language: "ruby" }])).toBe("\n```ruby\nputs 1\n```\n");
  });

  it("returns an empty string without blocks", () => {
    expect(renderBlocks([])).toBe("");
  });
});

describe("tableToMarkdown", () => {
  it("uses the first row as the header", () => {
    const markup =
      "<table><tbody><tr><th>Name</th><th>Access</th></tr><tr><td>Ana</td><td>Admin</td></tr></tbody></table>";
    expect(tableToMarkdown(markup)).toBe("| Name | Access |\n| --- | --- |\n| Ana | Admin |");
  });
});

describe("buildLearningPack", () => {
  const book: Book = {
    title: "Admin Guide",
    description: "Everything admins need",
    url: "https://learn.example.com/book",
    scrapedAt: "2024-03-01T10:00:00.000Z",
    cancelled: false,
    chapters: [
      {
        number: 1,
        title: "Basics",
        articles: [
          article(1, "Welcome", 120),
          { number: 2, title: "Setup", url: "https://learn.example.com/setup", error: "HTTP 500" },
        ],
      },
      { number: 2, title: "Advanced", articles: [article(1, "Roles", 450)] },
    ],
    totals: { chapterCount: 2, articleCount: 3, imageCount: 0 },
  };

  it("creates one unit per scraped article", () => {
    const pack = buildLearningPack(book);

    expect(pack.learningUnits.map((unit) => unit.id)).toEqual(["ch1_art1", "ch2_art1"]);
    expect(pack.learningUnits[1]).toEqual({
      id: "ch2_art1",
      chapter: "Advanced",
      chapterNumber: 2,
      title: "Roles",
      content: "Roles text",
      structuredContent: [{ type: "paragraph", text: "Roles text" }],
      images: [],
      metadata: { wordCount: 450, readingTimeMinutes: 2, difficulty: "easy", reviewIntervalsDays: [1, 3] },
      context: { previousChapter: "Basics", sourceUrl: "https://learn.example.com/roles" },
    });
  });

  it("has no previous chapter for the first chapter", () => {
    expect(buildLearningPack(book).learningUnits[0]?.context.previousChapter).toBeNull();
  });

  it("summarises the units", () => {
    const pack = buildLearningPack(book);

    expect(pack).toMatchObject({
      bookTitle: "Admin Guide",
      bookDescription: "Everything admins need",
      sourceUrl: "https://learn.example.com/book",
      scrapedAt: "2024-03-01T10:00:00.000Z",
    });
    expect(pack.summary).toEqual({
      totalLearningUnits: 2,
      totalChapters: 2,
      totalImages: 0,
      totalWords: 570,
      totalReadingTimeMinutes: 3,
    });
  });
});
