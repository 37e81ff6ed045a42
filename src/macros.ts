/**
 * Confluence element dispatch.
 *
 * How: `classifyElement` turns a DOM element into one variant of the closed
 * `ConfluenceElement` union, carrying the fields its handler needs. The
 * dispatcher renders a variant into a `MacroResult`; the converter decides
 * how a result combines with turndown's default output for the element.
 */

import type { AttachmentResolver } from "./attachments.js";
import { errorMessage } from "./errors.js";
import { codeBodyFromMacroMarkup, filenameFromImageMarkup, languageFromMacroMarkup } from "./macro-extractors.js";
import type { Page } from "./page.js";
import {
  childElements,
  diagramKey,
  findChild,
  parameterValue,
  parseRevision,
  tagName,
  type DiagramRef,
} from "./storage-dom.js";
import { TableFlattener } from "./table-flatten.js";

export type MacroResult =
  | { type: "handled"; text: string }
  /** Emit `text`, then let the default rendering of the element follow it. */
  | { type: "continue"; text: string }
  | { type: "unhandled" };

export type AdmonitionVariant = "info" | "warning" | "note" | "tip";

export type ConfluenceElement =
  | { kind: "image"; filename: string }
  | { kind: "emoticon"; fallback: string; shortname: string; name: string }
  | { kind: "link"; accountId?: string }
  | { kind: "inline-comment"; text: string; ref: string }
  | { kind: "placeholder"; text: string }
  | { kind: "time"; datetime?: string }
  | { kind: "admonition"; variant: AdmonitionVariant; body?: Element }
  | { kind: "code"; language: string; code: string }
  | { kind: "diagram"; filename: string; revision: number }
  | { kind: "expand"; body?: Element }
  | { kind: "toc"; parameterized: boolean }
  | { kind: "status"; title: string; colour: string }
  | { kind: "children" }
  | { kind: "unsupported-macro"; name: string }
  | { kind: "table"; table: Element };

export type ConfluenceElementKind = ConfluenceElement["kind"];

/** Tags the dispatcher owns; everything else is left to turndown's rules. */
export const DISPATCHED_TAGS: ReadonlySet<string> = new Set([
  "ac:image",
  "ac:emoticon",
  "ac:link",
  "ac:inline-comment-marker",
  "ac:placeholder",
  "time",
  "ac:structured-macro",
  "table",
]);

const BLOCK_KINDS: ReadonlySet<ConfluenceElementKind> = new Set<ConfluenceElementKind>([
  "admonition",
  "code",
  "diagram",
  "expand",
  "toc",
  "children",
  "unsupported-macro",
  "table",
]);

const ADMONITIONS: Record<AdmonitionVariant, { emoji: string; label: string }> = {
  info: { emoji: "ℹ️", label: "Info" },
  warning: { emoji: "⚠️", label: "Warning" },
  note: { emoji: "📝", label: "Note" },
  tip: { emoji: "💡", label: "Tip" },
};

const STATUS_EMOJI: Record<string, string> = {
  red: "🔴",
  yellow: "🟡",
  green: "🟢",
  blue: "🔵",
  grey: "⚪",
  gray: "⚪",
};

export function isBlockKind(element: ConfluenceElement): boolean {
  return BLOCK_KINDS.has(element.kind);
}

function isAdmonition(name: string): name is AdmonitionVariant {
  return name === "info" || name === "warning" || name === "note" || name === "tip";
}

function stripBlankEdges(s: string): string {
  return s.replace(/^(?:[ \t]*\r?\n)+/, "").replace(/(?:\r?\n[ \t]*)+$/, "");
}

function codeBody(macro: Element): string {
  const body = findChild(macro, "ac:plain-text-body");
  const protectedBlock = body
    ? childElements(body).find((child) => tagName(child) === "pre" && child.getAttribute("data-cdata") === "true")
    : undefined;
  if (protectedBlock) return stripBlankEdges(protectedBlock.textContent ?? "");
  return stripBlankEdges(codeBodyFromMacroMarkup(macro.outerHTML));
}

function classifyMacro(el: Element): ConfluenceElement {
  const name = el.getAttribute("ac:name") || "unknown";
  if (isAdmonition(name)) {
    return { kind: "admonition", variant: name, body: findChild(el, "ac:rich-text-body") };
  }
  switch (name) {
    case "code":
      return { kind: "code", language: languageFromMacroMarkup(el.outerHTML).trim(), code: codeBody(el) };
    case "mermaid-cloud":
      return {
        kind: "diagram",
        filename: parameterValue(el, "filename"),
        revision: parseRevision(parameterValue(el, "revision")),
      };
    case "expand":
    case "details":
      return { kind: "expand", body: findChild(el, "ac:rich-text-body") };
    case "toc":
      return { kind: "toc", parameterized: childElements(el).some((child) => tagName(child) === "ac:parameter") };
    case "status":
      return { kind: "status", title: parameterValue(el, "title"), colour: parameterValue(el, "colour") };
    case "children":
      return { kind: "children" };
    default:
      return { kind: "unsupported-macro", name };
  }
}

/** Variant for `el`, or undefined when the element is not a Confluence construct. */
export function classifyElement(el: Element): ConfluenceElement | undefined {
  switch (tagName(el)) {
    case "ac:image":
      return { kind: "image", filename: el.getAttribute("ri:filename") || filenameFromImageMarkup(el.outerHTML) };
    case "ac:emoticon":
      return {
        kind: "emoticon",
        fallback: el.getAttribute("ac:emoji-fallback") ?? "",
        shortname: el.getAttribute("ac:emoji-shortname") ?? "",
        name: el.getAttribute("ac:name") ?? "",
      };
    case "ac:link": {
      const user = findChild(el, "ri:user");
      return { kind: "link", accountId: user?.getAttribute("ri:account-id") || undefined };
    }
    case "ac:inline-comment-marker":
      return { kind: "inline-comment", text: el.textContent ?? "", ref: el.getAttribute("ac:ref") ?? "" };
    case "ac:placeholder":
      return { kind: "placeholder", text: (el.textContent ?? "").trim() };
    case "time":
      return { kind: "time", datetime: el.getAttribute("datetime") ?? undefined };
    case "ac:structured-macro":
      return classifyMacro(el);
    case "table":
      return { kind: "table", table: el };
    default:
      return undefined;
  }
}

export function renderBlockquote(variant: AdmonitionVariant, content: string): string {
  const { emoji, label } = ADMONITIONS[variant];
  const prefix = `${emoji} **${label}:**`;
  if (!content) return `> ${prefix}`;
  if (!content.includes("\n")) return `> ${prefix} ${content}`;
  const quoted = content.split("\n").map((line) => (line.trim() === "" ? ">" : `> ${line}`));
  return [`> ${prefix}`, ...quoted].join("\n");
}

type DiagramLoad = { ok: true; content: string } | { ok: false; message: string };

export interface DispatcherOptions {
  imageFolder: string;
  resolver?: AttachmentResolver;
  /** Markdown for the children of an element, used for nested content. */
  renderContent: (el: Element) => string;
}

/**
 * Renders Confluence elements. Holds the page being converted, so one
 * dispatcher serves one conversion at a time.
 */
export class MacroDispatcher {
  private currentPage: Page | undefined;
  private readonly diagrams = new Map<string, DiagramLoad>();
  private readonly tables: TableFlattener;

  constructor(private readonly options: DispatcherOptions) {
    this.tables = new TableFlattener({
      renderContent: (el) => options.renderContent(el),
      renderInline: (el) => {
        const element = classifyElement(el);
        return element ? this.render(element) : undefined;
      },
    });
  }

  get page(): Page | undefined {
    return this.currentPage;
  }

  setCurrentPage(page: Page | undefined): void {
    this.currentPage = page;
    this.diagrams.clear();
  }

  /**
   * Resolve diagram attachments ahead of rendering. Turndown renders
   * synchronously, so the handler reads from this cache.
   */
  async prepareDiagrams(diagrams: DiagramRef[]): Promise<void> {
    const resolver = this.options.resolver;
    if (!resolver || !this.currentPage) return;
    for (const ref of diagrams) {
      const key = diagramKey(ref);
      if (this.diagrams.has(key)) continue;
      try {
        const content = await resolver.resolve(this.currentPage, ref.filename, ref.revision);
        this.diagrams.set(key, { ok: true, content });
      } catch (err) {
        this.diagrams.set(key, { ok: false, message: errorMessage(err) });
      }
    }
  }

  dispatch(el: Element): MacroResult {
    const element = classifyElement(el);
    return element ? this.render(element) : { type: "unhandled" };
  }

  render(element: ConfluenceElement): MacroResult {
    switch (element.kind) {
      case "image":
        return { type: "handled", text: this.renderImage(element.filename) };
      case "emoticon":
        return { type: "continue", text: renderEmoticon(element) };
      case "link":
        return element.accountId ? { type: "handled", text: `@user(${element.accountId})` } : { type: "unhandled" };
      case "inline-comment":
        return {
          type: "handled",
          text: element.ref ? `${element.text}<!-- comment-ref: ${element.ref} -->` : element.text,
        };
      case "placeholder":
        return { type: "handled", text: element.text ? `<!-- ${element.text} -->` : "" };
      case "time":
        return element.datetime ? { type: "handled", text: element.datetime } : { type: "unhandled" };
      case "admonition":
        return { type: "handled", text: renderBlockquote(element.variant, this.renderNested(element.body)) };
      case "code":
        return { type: "handled", text: "```" + element.language + "\n" + element.code + "\n```\n" };
      case "diagram":
        return { type: "handled", text: this.renderDiagram(element) };
      case "expand": {
        const content = this.renderNested(element.body);
        return { type: "handled", text: content ? content + "\n\n" : "" };
      }
      case "toc":
        return element.parameterized
          ? { type: "handled", text: "<!-- Table of Contents -->" }
          : { type: "continue", text: "<!-- Table of Contents -->" };
      case "status":
        return { type: "handled", text: renderStatus(element.title, element.colour) };
      case "children":
        return { type: "handled", text: "<!-- Child Pages -->" };
      case "unsupported-macro":
        return { type: "handled", text: `<!-- Unsupported macro: ${element.name} -->` };
      case "table":
        return this.tables.render(element.table);
      default: {
        const unreachable: never = element;
        return unreachable;
      }
    }
  }

  private renderImage(filename: string): string {
    if (!filename) return "<!-- Image attachment not found -->";
    const localPath = `${this.options.imageFolder}/${filename}`;
    return `![${filename}](${localPath.split("/").map(encodeURIComponent).join("/")})`;
  }

  private renderDiagram(ref: DiagramRef): string {
    const { filename } = ref;
    if (!filename) return "<!-- Mermaid macro missing filename -->";
    if (!this.options.resolver) return `<!-- Mermaid attachment ${filename} unavailable: no attachment resolver -->`;
    if (!this.currentPage) return `<!-- Mermaid attachment ${filename} unavailable: no page context -->`;

    const load = this.diagrams.get(diagramKey(ref));
    if (!load) return `<!-- Mermaid attachment ${filename} unavailable: not loaded -->`;
    if (!load.ok) return `<!-- Failed to load mermaid ${filename}: ${load.message} -->`;

    const content = load.content.trim();
    if (!content) return "<!-- Empty mermaid macro -->";
    return "```mermaid\n" + content + "\n```\n";
  }

  /** Markdown for a macro's rich-text body; the macro's parameters never reach it. */
  private renderNested(body: Element | undefined): string {
    if (!body) return "";
    return this.options.renderContent(body).replace(/\n{3,}/g, "\n\n").trim();
  }
}

function renderEmoticon(element: { fallback: string; shortname: string; name: string }): string {
  if (element.fallback) return element.fallback + " ";
  if (element.shortname) return element.shortname + " ";
  if (element.name) return `:${element.name}:`;
  return ":emoji: ";
}

function renderStatus(title: string, colour: string): string {
  if (!title) return "";
  const emoji = STATUS_EMOJI[colour.toLowerCase()];
  return emoji ? `${emoji} **${title}**` : `**[${title}]**`;
}
