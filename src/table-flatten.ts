/**
 * Table rendering for Confluence storage tables.
 *
 * Cells holding lists, several paragraphs or line breaks are "complex" and
 * are flattened into one line of inline HTML; simple cells use the Markdown
 * the engine already produced for them.
 */

import { childElements, hasDescendant, isElement, isText, stripInlineAnchors, tagName } from "./storage-dom.js";
import type { MacroResult } from "./macros.js";

export interface TableHooks {
  /** Markdown for the children of `el`. */
  renderContent(el: Element): string;
  /** Route a Confluence element to its handler; undefined when it is not one. */
  renderInline(el: Element): MacroResult | undefined;
}

const ALWAYS_COMPLEX = new Set(["ul", "ol", "div", "blockquote", "pre", "table"]);
const TEXT_BLOCKS = new Set(["p", "h1", "h2", "h3", "h4", "h5", "h6"]);
const HEADINGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);
const LITERAL_INLINE = new Set(["strong", "b", "em", "i", "code", "a"]);
const ROUTED = new Set([
  "ac:structured-macro",
  "ac:emoticon",
  "ac:link",
  "time",
  "ac:inline-comment-marker",
  "ac:placeholder",
  "ac:image",
]);
const SECTION_ORDER = ["thead", "tbody", "tfoot"];

export function isComplexCell(cell: Element): boolean {
  let textBlocks = 0;
  for (const child of childElements(cell)) {
    const name = tagName(child);
    if (ALWAYS_COMPLEX.has(name) || name === "br") return true;
    if (TEXT_BLOCKS.has(name)) {
      textBlocks++;
      if (textBlocks > 1 || hasDescendant(child, "br")) return true;
    }
  }
  return false;
}

function isEmptyElement(el: Element): boolean {
  return Array.from(el.childNodes).every((child) => isText(child) && child.data.trim() === "");
}

function flattenInto(out: string[], parent: Element, hooks: TableHooks): void {
  for (const child of Array.from(parent.childNodes)) {
    if (isText(child)) {
      out.push(child.data);
      continue;
    }
    if (!isElement(child)) continue;

    const name = tagName(child);
    if (HEADINGS.has(name)) {
      out.push("<strong>");
      flattenInto(out, child, hooks);
      out.push("</strong>");
    } else if (name === "br") {
      out.push("<br>");
    } else if (name === "p") {
      if (isEmptyElement(child)) continue;
      flattenInto(out, child, hooks);
      if (child.nextSibling) out.push(" ");
    } else if (LITERAL_INLINE.has(name)) {
      out.push(child.outerHTML);
    } else if (ROUTED.has(name)) {
      const result = hooks.renderInline(child);
      if (result && result.type !== "unhandled") out.push(result.text);
      if (!result || result.type !== "handled") flattenInto(out, child, hooks);
    } else {
      flattenInto(out, child, hooks);
    }
  }
}

/** Single-line inline HTML for a complex cell. */
export function flattenCell(cell: Element, hooks: TableHooks): string {
  const out: string[] = [];
  flattenInto(out, cell, hooks);
  return stripInlineAnchors(out.join("")).replace(/[\r\n]+/g, " ").replace(/\s+/g, " ").trim();
}

export function cellText(cell: Element, hooks: TableHooks): string {
  const text = isComplexCell(cell)
    ? flattenCell(cell, hooks)
    : hooks.renderContent(cell).replace(/\s*\n\s*/g, " ").trim();
  return text === "" || text === "&nbsp;" ? " " : text;
}

interface TableRow {
  header: boolean;
  cells: string[];
}

export class TableFlattener {
  constructor(private readonly hooks: TableHooks) {}

  private collectRows(table: Element): TableRow[] | undefined {
    const sections = childElements(table)
      .filter((child) => SECTION_ORDER.includes(tagName(child)))
      .sort((a, b) => SECTION_ORDER.indexOf(tagName(a)) - SECTION_ORDER.indexOf(tagName(b)));
    if (!sections.some((section) => tagName(section) === "tbody")) return undefined;

    const rows: TableRow[] = [];
    for (const section of sections) {
      for (const tr of childElements(section).filter((child) => tagName(child) === "tr")) {
        const cells = childElements(tr).filter((child) => tagName(child) === "td" || tagName(child) === "th");
        if (cells.length === 0) continue;
        rows.push({
          header: cells.every((cell) => tagName(cell) === "th"),
          cells: cells.map((cell) => cellText(cell, this.hooks)),
        });
      }
    }
    return rows;
  }

  /**
   * GFM table for `table`. A separator follows the first row when it is a
   * header row, or when no row is.
   */
  render(table: Element): MacroResult {
    const rows = this.collectRows(table);
    if (!rows || rows.length === 0) return { type: "unhandled" };

    const maxCols = Math.max(...rows.map((row) => row.cells.length));
    const anyHeader = rows.some((row) => row.header);
    const lines: string[] = [];
    rows.forEach((row, index) => {
      const cells = [...row.cells];
      while (cells.length < maxCols) cells.push(" ");
      lines.push(`| ${cells.join(" | ")} |`);
      if (index === 0 && (row.header || !anyHeader)) {
        lines.push("|" + "---|".repeat(maxCols));
      }
    });
    return { type: "handled", text: lines.join("\n") };
  }
}
