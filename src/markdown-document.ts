/**
 * Converted page: YAML frontmatter, Markdown body and the images it refers to.
 */

import { stringify } from "yaml";
import { pageLabelNames, pageUrl, type Page } from "./page.js";

export interface ConfluenceRef {
  pageId: string;
  spaceKey: string;
  version: number;
  url: string;
}

export interface Frontmatter {
  title: string;
  author: string;
  date?: Date;
  labels: string[];
  confluence: ConfluenceRef;
  /** Extra top-level keys, written after `confluence`. */
  custom: Record<string, unknown>;
}

export interface ImageRef {
  readonly originalUrl: string;
  readonly localPath: string;
  readonly fileName: string;
  /** Set by the image downloader once the file has been fetched. */
  contentType?: string;
  size?: number;
}

/** RFC 3339 timestamp without fractional seconds. */
export function formatDate(date: Date | undefined): string {
  if (!date || Number.isNaN(date.getTime())) return "";
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function frontmatterFromPage(page: Page, baseUrl: string): Frontmatter {
  return {
    title: page.title,
    author: page.createdBy?.displayName ?? "",
    date: page.updatedAt,
    labels: pageLabelNames(page),
    confluence: {
      pageId: page.id,
      spaceKey: page.spaceKey,
      version: page.version,
      url: pageUrl(page, baseUrl),
    },
    custom: {},
  };
}

export class MarkdownDocument {
  readonly frontmatter: Frontmatter;
  readonly content: string;
  /**
   * Image manifest. The array and its entries are the one part of the
   * document that may change after conversion: the image downloader fills in
   * `contentType` and `size` in place.
   */
  readonly images: ImageRef[];

  constructor(frontmatter: Frontmatter, content: string, images: ImageRef[] = []) {
    this.frontmatter = frontmatter;
    this.content = content;
    this.images = images;
  }

  renderFrontmatter(): string {
    const fm = this.frontmatter;
    const data: Record<string, unknown> = {
      title: fm.title,
      author: fm.author,
      date: formatDate(fm.date),
    };
    if (fm.labels.length > 0) data.labels = fm.labels;
    data.confluence = {
      pageId: fm.confluence.pageId,
      spaceKey: fm.confluence.spaceKey,
      version: fm.confluence.version,
      url: fm.confluence.url,
    };
    for (const [key, value] of Object.entries(fm.custom)) {
      if (!(key in data)) data[key] = value;
    }
    const yaml = stringify(data, { defaultStringType: "QUOTE_DOUBLE", defaultKeyType: "PLAIN", lineWidth: 0 });
    return `---\n${yaml}---\n\n`;
  }

  serialize(includeFrontmatter: boolean): string {
    return includeFrontmatter ? this.renderFrontmatter() + this.content : this.content;
  }
}
