import { describe, expect, it } from "vitest";
import {
  attributeMatches,
  collectText,
  directListItems,
  elementText,
  findByRules,
  findFirst,
  matchesRule,
  nextInDocument,
  pageText,
  parseDocument,
  readableText,
  resolveUrl,
} from "./dom.js";

function body(html: string): Element {
  return parseDocument(`<html><body>${html}</body></html>`).body;
}

describe("elementText", () => {
  it("collapses whitespace and trims", () => {
    const root = body("<p>  Hello \n\n  <b>world</b>  </p>");
    expect(elementText(root.querySelector("p"))).toBe("Hello world");
  });

  it("returns an empty string for a missing element", () => {
    expect(elementText(null)).toBe("");
  });
});

describe("collectText", () => {
  it("joins text nodes with single spaces and skips scripts", () => {
    const root = body("<div><h2>Title</h2><p>First<em>second</em></p><script>var x = 1;</script></div>");
    expect(collectText(root)).toBe("Title First second");
  });
});

describe("pageText", () => {
  it("keeps line breaks from the markup", () => {
    const document = parseDocument("<html><body><p>Salary</p>\n<p>$90k</p><style>p{}</style></body></html>");
    expect(pageText(document)).toBe("Salary\n$90k");
  });

  it("puts adjacent block elements on their own lines", () => {
    const document = parseDocument(
      "<html><head><title>Analyst</title></head><body><ul><li>SQL</li><li>Bachelor's   degree</li></ul><p>Call <b>now</b></p></body></html>",
    );
    expect(pageText(document)).toBe("Analyst\nSQL\nBachelor's degree\nCall now");
  });
});

describe("readableText", () => {
  it("drops navigation, header and footer", () => {
    const document = parseDocument(
      "<html><body><header>Logo</header><nav>Home</nav><main><p>Body text</p></main><footer>Copyright</footer></body></html>",
    );
    expect(readableText(document)).toBe("Body text");
  });
});

describe("attributeMatches", () => {
  const root = body('<div class="job-title main" data-automation="job-detail-title"></div>');
  const div = root.querySelector("div");

  it("matches literals exactly", () => {
    expect(div && attributeMatches(div, "data-automation", "job-detail-title")).toBe(true);
    expect(div && attributeMatches(div, "data-automation", "job-detail")).toBe(false);
  });

  it("matches class patterns against each token", () => {
    expect(div && attributeMatches(div, "class", /^main$/)).toBe(true);
    expect(div && attributeMatches(div, "class", /job.*title/)).toBe(true);
  });

  it("fails when the attribute is absent", () => {
    expect(div && attributeMatches(div, "id", /.*/)).toBe(false);
  });
});

describe("matchesRule", () => {
  it("checks the tag before attributes", () => {
    const root = body('<span class="company"></span>');
    const span = root.querySelector("span");
    expect(span && matchesRule(span, { tag: "span", attrs: { class: /company/ } })).toBe(true);
    expect(span && matchesRule(span, { tag: "div", attrs: { class: /company/ } })).toBe(false);
    expect(span && matchesRule(span, { tag: "span" })).toBe(true);
  });
});

describe("findFirst / findByRules", () => {
  const root = body('<h2 class="title">Second</h2><h1>Plain</h1><h1 class="job-title">Engineer</h1>');

  it("returns the first match in document order", () => {
    expect(elementText(findFirst(root, { tag: "h1" }))).toBe("Plain");
  });

  it("tries rules in priority order", () => {
    const found = findByRules(root, [{ tag: "h1", attrs: { class: /job.*title/ } }, { tag: "h1" }]);
    expect(elementText(found)).toBe("Engineer");
  });

  it("returns null when no rule matches", () => {
    expect(findByRules(root, [{ tag: "h3" }])).toBeNull();
  });
});

describe("nextInDocument", () => {
  it("finds the next list after a heading, across parents", () => {
    const root = body("<div><h3>Requirements</h3></div><p>Intro</p><ul><li>SQL</li></ul><ol><li>Other</li></ol>");
    const heading = root.querySelector("h3");
    const list = heading && nextInDocument(heading, ["ul", "ol"]);
    expect(list?.tagName).toBe("UL");
  });

  it("returns null when nothing follows", () => {
    const root = body("<ul><li>Before</li></ul><h3>Benefits</h3>");
    const heading = root.querySelector("h3");
    expect(heading && nextInDocument(heading, ["ul", "ol"])).toBeNull();
  });
});

describe("directListItems", () => {
  it("ignores nested list items", () => {
    const root = body("<ul><li>One<ul><li>Nested</li></ul></li><li>Two</li></ul>");
    const list = root.querySelector("ul");
    expect(list && directListItems(list).map((li) => li.firstChild?.textContent)).toEqual(["One", "Two"]);
  });
});

describe("resolveUrl", () => {
  const baseUrl = "https://example.com";

  it("returns absolute URLs as-is", () => {
    expect(resolveUrl("https://other.com/page", baseUrl)).toBe("https://other.com/page");
  });

  it("resolves root-relative and relative URLs", () => {
    expect(resolveUrl("/page", "https://example.com/dir/page.html")).toBe("https://example.com/page");
    expect(resolveUrl("page.html", "https://example.com/dir/index.html")).toBe("https://example.com/dir/page.html");
    expect(resolveUrl("../page", "https://example.com/dir/sub/")).toBe("https://example.com/dir/page");
  });

  it("handles protocol-relative URLs", () => {
    expect(resolveUrl("//cdn.example.com/a.png", "http://example.com")).toBe("http://cdn.example.com/a.png");
  });

  it("keeps query strings and fragments", () => {
    expect(resolveUrl("?query=value", "https://example.com/page")).toBe("https://example.com/page?query=value");
    expect(resolveUrl("#anchor", "https://example.com/page")).toBe("https://example.com/page#anchor");
  });

  it("returns null for invalid URLs", () => {
    expect(resolveUrl("", "not-a-url")).toBeNull();
    expect(resolveUrl("https://", baseUrl)).toBeNull();
  });
});
