import { describe, it, expect } from "vitest";
import { MarkdownDocument, formatDate, frontmatterFromPage, type Frontmatter } from "../markdown-document.js";
import type { Page } from "../page.js";

const page: Page = {
  id: "123",
  title: "Test Page",
  spaceKey: "DOC",
  version: 3,
  content: "<p>x</p>",
  labels: ["alpha", "beta"],
  attachments: [],
  createdBy: { displayName: "Ada" },
  updatedAt: new Date("2024-05-01T10:20:30.456Z"),
};

describe("formatDate", () => {
  it("drops fractional seconds", () => {
    expect(formatDate(new Date("2024-05-01T10:20:30.456Z"))).toBe("2024-05-01T10:20:30Z");
  });

  it("returns an empty string for missing or invalid dates", () => {
    expect(formatDate(undefined)).toBe("");
    expect(formatDate(new Date("not a date"))).toBe("");
  });
});

describe("MarkdownDocument", () => {
  it("renders frontmatter in a fixed key order", () => {
    const doc = new MarkdownDocument(frontmatterFromPage(page, "https://example.atlassian.net"), "Body");
    expect(doc.renderFrontmatter()).toBe(
      [
        "---",
        'title: "Test Page"',
        'author: "Ada"',
        'date: "2024-05-01T10:20:30Z"',
        "labels:",
        '  - "alpha"',
        '  - "beta"',
        "confluence:",
        '  pageId: "123"',
        '  spaceKey: "DOC"',
        "  version: 3",
        '  url: "https://example.atlassian.net/wiki/spaces/DOC/pages/123/Test%20Page"',
        "---",
        "",
        "",
      ].join("\n"),
    );
  });

  it("omits empty labels and writes custom keys last", () => {
    const frontmatter: Frontmatter = {
      ...frontmatterFromPage({ ...page, labels: [], createdBy: undefined, updatedAt: undefined }, "https://example.atlassian.net"),
      custom: { reviewed: true },
    };
    const yaml = new MarkdownDocument(frontmatter, "").renderFrontmatter();
    expect(yaml).toContain('author: ""\ndate: ""\nconfluence:\n');
    expect(yaml.endsWith("reviewed: true\n---\n\n")).toBe(true);
  });

  it("escapes quotes in titles", () => {
    const doc = new MarkdownDocument(frontmatterFromPage({ ...page, title: 'Say "hi"' }, "https://example.atlassian.net"), "");
    expect(doc.renderFrontmatter()).toContain('title: "Say \\"hi\\""\n');
  });

  it("serializes with or without frontmatter", () => {
    const doc = new MarkdownDocument(frontmatterFromPage(page, "https://example.atlassian.net"), "# Body");
    expect(doc.serialize(false)).toBe("# Body");
    expect(doc.serialize(true)).toBe(doc.renderFrontmatter() + "# Body");
  });

  it("defaults to an empty image manifest", () => {
    const doc = new MarkdownDocument(frontmatterFromPage(page, "https://example.atlassian.net"), "");
    expect(doc.images).toEqual([]);
  });
});
