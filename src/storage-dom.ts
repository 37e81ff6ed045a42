/**
 * Storage DOM helpers.
 *
 * Why: Confluence storage format is XHTML with namespaced `ac:`/`ri:` elements
 * and CDATA sections. HTML parsers drop CDATA and treat `<ac:foo/>` as an open
 * tag, so the markup is normalized before it reaches a parser, and the
 * helpers below work on whatever DOM the parser produced.
 */

import { parseHTML } from "linkedom";

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;

const VOID_ELEMENTS = new Set([
  "area", "base", "br", "col", "embed", "hr", "img", "input", "link", "meta", "param", "source", "track", "wbr",
]);

const SELF_CLOSING_TAG_RE =
  /<([a-zA-Z][\w.-]*(?::[\w.-]+)?)((?:\s+[^\s"'=/>]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s"'>]+))?)*)\s*\/>/g;
const LINK_BODY_CDATA_RE =
  /<ac:plain-text-link-body>\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*<\/ac:plain-text-link-body>/g;
const CDATA_RE = /<!\[CDATA\[([\s\S]*?)\]\]>/g;

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Rewrite CDATA sections into `<pre data-cdata='true'>` blocks with their text
 * escaped, so the exact characters survive HTML parsing.
 *
 * Link bodies are inlined as escaped text instead: a `pre` inside a paragraph
 * makes an HTML5 parser close the paragraph and the link around it.
 */
export function protectCdata(html: string): string {
  return html
    .replace(LINK_BODY_CDATA_RE, (_m, text: string) => `<ac:plain-text-link-body>${escapeHtml(text)}</ac:plain-text-link-body>`)
    .replace(CDATA_RE, (_m, text: string) => `<pre data-cdata='true'>${escapeHtml(text)}</pre>`);
}

/** `<ac:image ri:filename="a.png"/>` → `<ac:image ri:filename="a.png"></ac:image>`; void HTML tags are kept. */
export function expandSelfClosingTags(html: string): string {
  return html.replace(SELF_CLOSING_TAG_RE, (match, name: string, attrs: string) => {
    if (VOID_ELEMENTS.has(name.toLowerCase())) return match;
    return `<${name}${attrs}></${name}>`;
  });
}

/**
 * Placed inside inline elements that have no text of their own. Turndown
 * treats a space after an empty inline element as adjacent to the space
 * before it and drops one; the anchor keeps both. Renderers strip it.
 */
export const INLINE_ANCHOR = "\u200b";
const INLINE_ANCHOR_RE = /\u200b/g;
const EMPTY_INLINE_RE = /<(time|ac:emoticon|ac:image|ac:link)(\s[^>]*)?>((?:\s*<\/?ri:[^>]*>)*\s*)<\/\1>/g;

export function anchorEmptyInlines(html: string): string {
  return html.replace(
    EMPTY_INLINE_RE,
    (_m, name: string, attrs: string | undefined, inner: string) => `<${name}${attrs ?? ""}>${inner}${INLINE_ANCHOR}</${name}>`,
  );
}

export function stripInlineAnchors(s: string): string {
  return s.replace(INLINE_ANCHOR_RE, "");
}

export function preprocessStorage(html: string): string {
  return anchorEmptyInlines(expandSelfClosingTags(protectCdata(html)));
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

export function tagName(el: Element): string {
  return el.nodeName.toLowerCase();
}

export function childElements(el: Element): Element[] {
  return Array.from(el.childNodes).filter(isElement);
}

export function findChild(el: Element, name: string): Element | undefined {
  return childElements(el).find((child) => tagName(child) === name);
}

export function findDescendant(el: Element, name: string): Element | undefined {
  for (const child of childElements(el)) {
    if (tagName(child) === name) return child;
    const nested = findDescendant(child, name);
    if (nested) return nested;
  }
  return undefined;
}

export function hasDescendant(el: Element, name: string): boolean {
  return findDescendant(el, name) !== undefined;
}

/** Trimmed text of the direct `<ac:parameter ac:name="...">` child, empty when absent. */
export function parameterValue(macro: Element, name: string): string {
  const param = childElements(macro).find(
    (child) => tagName(child) === "ac:parameter" && child.getAttribute("ac:name") === name,
  );
  return param?.textContent?.trim() ?? "";
}

export interface DiagramRef {
  filename: string;
  revision: number;
}

/** Revision parameter as an integer; absent or non-numeric values mean "latest" (0). */
export function parseRevision(value: string): number {
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : 0;
}

export function diagramKey(ref: DiagramRef): string {
  return `${ref.filename}@${ref.revision}`;
}

export interface StorageScan {
  /** Filenames of `ac:image` elements in document order. */
  imageFilenames: string[];
  /** mermaid-cloud macros that name a filename. */
  diagrams: DiagramRef[];
}

/**
 * The slice of the DOM the scanner reads. Kept structural so it does not
 * depend on which DOM implementation produced the nodes.
 */
interface ScanNode {
  nodeType: number;
  nodeName: string;
  textContent: string | null;
  childNodes: ArrayLike<ScanNode>;
  getAttribute?(name: string): string | null;
}

function scanChildren(node: ScanNode): ScanNode[] {
  return Array.from(node.childNodes).filter((child) => child.nodeType === ELEMENT_NODE);
}

function attributeOf(node: ScanNode, name: string): string {
  return node.getAttribute?.(name) ?? "";
}

function nameOf(node: ScanNode): string {
  return node.nodeName.toLowerCase();
}

function firstFilename(node: ScanNode): string {
  const own = attributeOf(node, "ri:filename");
  if (own) return own;
  for (const child of scanChildren(node)) {
    const nested = firstFilename(child);
    if (nested) return nested;
  }
  return "";
}

function scanParameter(macro: ScanNode, name: string): string {
  const param = scanChildren(macro).find((child) => nameOf(child) === "ac:parameter" && attributeOf(child, "ac:name") === name);
  return param?.textContent?.trim() ?? "";
}

/**
 * Parse preprocessed storage HTML once with linkedom and collect what has to
 * be known before rendering: image attachments and diagram macros.
 */
export function scanStorage(html: string): StorageScan {
  const { document } = parseHTML(`<!DOCTYPE html><html><body>${html}</body></html>`);
  const scan: StorageScan = { imageFilenames: [], diagrams: [] };

  const visit = (node: ScanNode): void => {
    for (const child of scanChildren(node)) {
      const name = nameOf(child);
      if (name === "ac:image") {
        const filename = firstFilename(child);
        if (filename) scan.imageFilenames.push(filename);
      } else if (name === "ac:structured-macro" && attributeOf(child, "ac:name") === "mermaid-cloud") {
        const filename = scanParameter(child, "filename");
        if (filename) scan.diagrams.push({ filename, revision: parseRevision(scanParameter(child, "revision")) });
      }
      visit(child);
    }
  };
  visit(document);
  return scan;
}
