/**
 * Output file naming and writing for converted pages.
 *
 * Why: Page titles become filenames and directory names, so they need a
 * predictable, filesystem-safe form; users may also supply a template.
 */

import fs from "fs";
import path from "path";
import type { MarkdownDocument } from "./markdown-document.js";
import type { Page } from "./page.js";

export type FileNamer = (page: Page) => string;

const PLACEHOLDER_RE = /\{([^{}]*)\}/g;

/** "Release Notes (v2)" → "release-notes-v2". */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function defaultFileName(page: Page): string {
  const slug = slugify(page.title);
  return `${slug || "untitled"}.md`;
}

function placeholderValue(page: Page, name: string): string | undefined {
  switch (name) {
    case "title":
      return page.title;
    case "slug":
      return slugify(page.title);
    case "id":
      return page.id;
    case "space":
      return page.spaceKey;
    case "version":
      return String(page.version);
    default:
      return undefined;
  }
}

/**
 * Build a namer from a template such as "{space}-{slug}". Placeholders are
 * checked up front so a typo fails before any page is fetched.
 */
export function templateNamer(template: string): FileNamer {
  if (!template.trim()) throw new Error("template cannot be empty");
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const name = match[1] ?? "";
    if (!["title", "slug", "id", "space", "version"].includes(name)) {
      throw new Error(`unknown placeholder {${name}} in output name template`);
    }
  }
  return (page) => template.replace(PLACEHOLDER_RE, (whole, name: string) => placeholderValue(page, name) ?? whole);
}

/** File name for `page`: a single path segment, with `.md` added when it has no extension. */
export function generateFileName(page: Page, namer: FileNamer = defaultFileName): string {
  const raw = namer(page).trim();
  if (!raw) throw new Error("generated filename is empty");

  const name = path.basename(raw).replace(/[/\\]/g, "-");
  if (name === "." || name === "..") throw new Error(`generated filename is invalid: ${raw}`);
  return path.extname(name) ? name : `${name}.md`;
}

export function saveMarkdownDocument(doc: MarkdownDocument, outputPath: string, withFrontmatter: boolean): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, doc.serialize(withFrontmatter), "utf8");
}
