/**
 * Text extraction from raw macro markup.
 *
 * Why: Some macro fields are easier to read off the serialized markup than to
 * locate in the DOM, especially after an HTML parser has mangled CDATA.
 */

const IMAGE_FILENAME_RE = /ri:filename="([^"]+)"/;
const PLAIN_TEXT_BODY_RE = /<ac:plain-text-body>([\s\S]*?)<\/ac:plain-text-body>/;

const NAMED_ENTITIES: Record<string, string> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Decode the entities Confluence and HTML serializers emit: the XML five,
 * `&nbsp;`, and numeric references. Unknown names are left as written.
 */
export function decodeEntities(s: string): string {
  return s.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, ref: string) => {
    if (ref.startsWith("#")) {
      const hex = ref[1] === "x" || ref[1] === "X";
      const code = hex ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
      return code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
  });
}

export function filenameFromImageMarkup(markup: string): string {
  return markup.match(IMAGE_FILENAME_RE)?.[1] ?? "";
}

/** Text value of `<ac:parameter ac:name="...">`, empty when absent. */
export function macroParameter(markup: string, name: string): string {
  const re = new RegExp(`<ac:parameter[^>]*ac:name="${escapeRegExp(name)}"[^>]*>([^<]+)</ac:parameter>`);
  return markup.match(re)?.[1] ?? "";
}

export function languageFromMacroMarkup(markup: string): string {
  return macroParameter(markup, "language");
}

/**
 * Body of `<ac:plain-text-body>` with entities decoded and the CDATA wrapper
 * removed, whether it is still raw (`<![CDATA[`) or was rewritten by a
 * lenient parser into a comment (`<!--[CDATA[`).
 */
export function codeBodyFromMacroMarkup(markup: string): string {
  const region = markup.match(PLAIN_TEXT_BODY_RE)?.[1];
  if (region === undefined) return "";
  let body = decodeEntities(region);
  if (body.startsWith("<!--[CDATA[")) body = body.slice("<!--[CDATA[".length);
  if (body.endsWith("]]-->")) body = body.slice(0, -"]]-->".length);
  if (body.startsWith("<![CDATA[")) body = body.slice("<![CDATA[".length);
  if (body.endsWith("]]>")) body = body.slice(0, -"]]>".length);
  return body;
}
