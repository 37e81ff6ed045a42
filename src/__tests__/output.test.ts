import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, it, expect } from "vitest";
import { MarkdownDocument, frontmatterFromPage } from "../markdown-document.js";
import { defaultFileName, generateFileName, saveMarkdownDocument, slugify, templateNamer } from "../output.js";
import type { Page } from "../page.js";

const page: Page = {
  id: "42",
  title: "Release Notes (v2)",
  spaceKey: "DOC",
  version: 7,
  content: "<p>x</p>",
  labels: [],
  attachments: [],
};

describe("slugify", () => {
  it("lowercases and joins words with hyphens", () => {
    expect(slugify("Release Notes (v2)")).toBe("release-notes-v2");
    expect(slugify("  --Already--Sluggy--  ")).toBe("already-sluggy");
  });
});

describe("defaultFileName", () => {
  it("uses the title slug", () => {
    expect(defaultFileName(page)).toBe("release-notes-v2.md");
  });

  it("falls back to untitled", () => {
    expect(defaultFileName({ ...page, title: "!!!" })).toBe("untitled.md");
  });
});

describe("templateNamer", () => {
  it("fills every placeholder", () => {
    const namer = templateNamer("{space}-{id}-v{version}-{slug}");
    expect(namer(page)).toBe("DOC-42-v7-release-notes-v2");
    expect(templateNamer("{title}")(page)).toBe("Release Notes (v2)");
  });

  it("rejects empty templates and unknown placeholders", () => {
    expect(() => templateNamer("  ")).toThrow("template cannot be empty");
    expect(() => templateNamer("{author}-{slug}")).toThrow("unknown placeholder {author} in output name template");
  });
});

describe("generateFileName", () => {
  it("adds .md when the name has no extension", () => {
    expect(generateFileName(page, templateNamer("{space}-{id}"))).toBe("DOC-42.md");
    expect(generateFileName(page, () => "notes.markdown")).toBe("notes.markdown");
  });

  it("keeps the name to a single path segment", () => {
    expect(generateFileName(page, () => "../../etc/passwd")).toBe("passwd.md");
    expect(generateFileName(page, () => "a\\b")).toBe("a-b.md");
  });

  it("rejects empty and dot names", () => {
    expect(() => generateFileName(page, () => "   ")).toThrow("generated filename is empty");
    expect(() => generateFileName(page, () => "..")).toThrow("generated filename is invalid: ..");
  });

  it("uses the slug by default", () => {
    expect(generateFileName(page)).toBe("release-notes-v2.md");
  });
});

describe("saveMarkdownDocument", () => {
  let dir = "";

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the directory and writes the serialized document", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "storage-md-output-"));
    const doc = new MarkdownDocument(frontmatterFromPage(page, "https://example.atlassian.net"), "# Notes");
    const target = path.join(dir, "nested", "notes.md");

    saveMarkdownDocument(doc, target, false);
    expect(fs.readFileSync(target, "utf8")).toBe("# Notes");

    saveMarkdownDocument(doc, target, true);
    expect(fs.readFileSync(target, "utf8")).toBe(doc.serialize(true));
  });
});
