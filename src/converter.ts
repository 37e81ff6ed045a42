/**
 * Storage HTML → Markdown conversion.
 *
 * How: storage markup is normalized (CDATA, self-closing tags), scanned once
 * for images and diagram macros, rendered by Turndown with the Confluence
 * dispatcher installed as a rule, then cleaned up by `postprocessMarkdown`.
 */

import TurndownService from "turndown";
import { gfm } from "turndown-plugin-gfm";
import type { AttachmentResolver } from "./attachments.js";
import { errorMessage } from "./errors.js";
import {
  DISPATCHED_TAGS,
  MacroDispatcher,
  classifyElement,
  isBlockKind,
  type ConfluenceElement,
  type MacroResult,
} from "./macros.js";
import { MarkdownDocument, frontmatterFromPage, type ImageRef } from "./markdown-document.js";
import { validatePage, type Page } from "./page.js";
import { isElement, preprocessStorage, scanStorage, stripInlineAnchors, tagName } from "./storage-dom.js";

export const DEFAULT_IMAGE_FOLDER = "assets";

// Elements Turndown treats as blocks; a blank one still separates paragraphs.
const BLOCK_ELEMENTS = new Set([
  "address", "article", "aside", "audio", "blockquote", "body", "canvas", "center", "dd", "dir", "div", "dl", "dt",
  "fieldset", "figcaption", "figure", "footer", "form", "frameset", "h1", "h2", "h3", "h4", "h5", "h6", "header",
  "hgroup", "hr", "html", "isindex", "li", "main", "menu", "nav", "noframes", "noscript", "ol", "output", "p", "pre",
  "section", "table", "tbody", "td", "tfoot", "th", "thead", "tr", "ul",
]);

// Elements whose rendered children are reused by the dispatcher and the table flattener.
const REUSED_CONTENT = new Set(["ac:rich-text-body", "td", "th"]);

const NESTED_LIST_GAP_RE = /((?:^|\n)[ \t]*(?:[-*+]\s|\d+\.\s)[^\n]*)\n\s*\n(\s{2,}(?:[-*+]\s|\d+\.\s))/g;
const CONFLUENCE_PAGE_LINK_RE = /\[([^\]]+)\]\(\/wiki\/spaces\/([^/]+)\/pages\/(\d+)\/[^)]+\)/g;

/** Drop the blank line Turndown leaves between a list item and a nested item below it. */
export function fixNestedListSpacing(markdown: string): string {
  let current = markdown;
  for (;;) {
    const next = current.replace(NESTED_LIST_GAP_RE, "$1\n$2");
    if (next === current) return current;
    current = next;
  }
}

/** `[t](/wiki/spaces/S/pages/123/Title)` → `[t](confluence://pageId/123)`. */
export function fixConfluenceLinks(markdown: string): string {
  return markdown.replace(CONFLUENCE_PAGE_LINK_RE, "[$1](confluence://pageId/$3)");
}

export function postprocessMarkdown(markdown: string): string {
  let out = markdown.replace(/\n{3,}/g, "\n\n");
  out = fixNestedListSpacing(out);
  out = fixConfluenceLinks(out);
  return out.trim();
}

export function buildImageRefs(filenames: string[], pageId: string, baseUrl: string, imageFolder: string): ImageRef[] {
  const base = baseUrl.replace(/\/+$/, "");
  return filenames.map((fileName) => ({
    originalUrl: `${base}/wiki/download/attachments/${pageId}/${encodeURIComponent(fileName)}`,
    localPath: `${imageFolder}/${fileName}`,
    fileName,
  }));
}

function combine(result: MacroResult, content: string): string {
  switch (result.type) {
    case "handled":
      return result.text;
    case "continue":
      return result.text + stripInlineAnchors(content);
    case "unhandled":
      return stripInlineAnchors(content);
  }
}

/** Cell layout of turndown-plugin-gfm, whose cell rule the converter replaces. */
function markdownCell(content: string, cell: Element): string {
  const prefix = cell.parentNode && cell.parentNode.firstChild !== cell ? " " : "| ";
  return `${prefix}${content} |`;
}

export interface ConverterOptions {
  /** Folder, relative to the Markdown file, that images are linked from. */
  imageFolder?: string;
  /** Source of diagram attachment content; diagrams degrade to comments without it. */
  resolver?: AttachmentResolver;
}

export class Converter {
  readonly imageFolder: string;
  private readonly turndown: TurndownService;
  private readonly dispatcher: MacroDispatcher;
  private readonly rendered = new WeakMap<Element, string>();

  constructor(options: ConverterOptions = {}) {
    this.imageFolder = options.imageFolder ?? DEFAULT_IMAGE_FOLDER;
    this.turndown = new TurndownService({
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      bulletListMarker: "-",
      hr: "---",
      // Turndown short-circuits elements without text (<ac:image/>, <time/>,
      // a bare toc macro) before consulting rules. A blank paragraph can still
      // hold such an element, so rendered children are kept.
      blankReplacement: (content, node) => {
        if (!isElement(node)) return "";
        if (REUSED_CONTENT.has(tagName(node))) this.rendered.set(node, content);
        if (DISPATCHED_TAGS.has(tagName(node))) return this.replaceElement(content, node);
        const block = BLOCK_ELEMENTS.has(tagName(node));
        if (!content.trim()) return block ? "\n\n" : "";
        return block ? `\n\n${content}\n\n` : content;
      },
    });
    this.turndown.use(gfm);
    this.turndown.addRule("richTextBody", {
      filter: (node) => tagName(node) === "ac:rich-text-body",
      replacement: (content, node) => {
        if (isElement(node)) this.rendered.set(node, content);
        return content;
      },
    });
    this.turndown.addRule("tableCell", {
      filter: ["th", "td"],
      replacement: (content, node) => {
        if (!isElement(node)) return content;
        this.rendered.set(node, content);
        return markdownCell(content, node);
      },
    });
    this.turndown.addRule("confluence", {
      filter: (node) => DISPATCHED_TAGS.has(tagName(node)),
      replacement: (content, node) => (isElement(node) ? this.replaceElement(content, node) : content),
    });
    this.dispatcher = new MacroDispatcher({
      imageFolder: this.imageFolder,
      resolver: options.resolver,
      renderContent: (el) => this.renderContent(el),
    });
  }

  /**
   * Markdown for the children of `el`. Turndown renders children before their
   * parent, so content seen during the current pass is served from the cache.
   */
  private renderContent(el: Element): string {
    return this.rendered.get(el) ?? this.turndown.turndown(el.innerHTML);
  }

  private dispatch(el: Element): { element?: ConfluenceElement; result: MacroResult } {
    try {
      const element = classifyElement(el);
      return { element, result: element ? this.dispatcher.render(element) : { type: "unhandled" } };
    } catch (err) {
      console.warn(`[convert] failed to render <${tagName(el)}>: ${errorMessage(err)}`);
      return { result: { type: "unhandled" } };
    }
  }

  private replaceElement(content: string, el: Element): string {
    const { element, result } = this.dispatch(el);
    const block = element !== undefined ? isBlockKind(element) : BLOCK_ELEMENTS.has(tagName(el));
    const text = combine(result, content);
    return block ? `\n\n${text}\n\n` : text;
  }

  private renderStorage(preprocessed: string): string {
    try {
      return this.turndown.turndown(preprocessed);
    } catch (err) {
      console.warn(`[convert] render failed, continuing with an empty body: ${errorMessage(err)}`);
      return "";
    }
  }

  /** Convert a storage fragment with no page context (diagram macros degrade to comments). */
  convertHtml(html: string): string {
    this.dispatcher.setCurrentPage(undefined);
    return postprocessMarkdown(this.renderStorage(preprocessStorage(html)));
  }

  /**
   * Validate and convert a page. The returned document lists every image the
   * body references; fetching them is left to the image downloader.
   */
  async convertPage(page: Page, baseUrl: string): Promise<MarkdownDocument> {
    validatePage(page);
    this.dispatcher.setCurrentPage(page);
    const frontmatter = frontmatterFromPage(page, baseUrl);

    const html = preprocessStorage(page.content);
    const scan = scanStorage(html);
    await this.dispatcher.prepareDiagrams(scan.diagrams);

    const content = postprocessMarkdown(this.renderStorage(html));
    const images = buildImageRefs(scan.imageFilenames, page.id, baseUrl, this.imageFolder);
    return new MarkdownDocument(frontmatter, content, images);
  }
}
