/**
 * page / tree commands: fetch pages by URL, convert and write them to disk.
 */

import path from "path";
import { fromEnv, parsePageUrl, type ConfluenceClient } from "../api.js";
import { AttachmentService } from "../attachments.js";
import { Converter, DEFAULT_IMAGE_FOLDER } from "../converter.js";
import { ImageDownloader } from "../images.js";
import { defaultFileName, generateFileName, saveMarkdownDocument, slugify, templateNamer, type FileNamer } from "../output.js";
import type { Page } from "../page.js";
import { flagValue, hasFlag, parseArgs } from "./args.js";

interface Options {
  cwd: string;
  args?: string[];
  /** Injected in tests; built from the page URL and environment otherwise. */
  client?: ConfluenceClient;
}

interface ExportContext {
  prefix: string;
  client: ConfluenceClient;
  converter: Converter;
  images?: ImageDownloader;
  namer: FileNamer;
  withFrontmatter: boolean;
}

function setup(prefix: string, opts: Options): { ctx: ExportContext; pageId: string; outputDir: string } {
  const parsed = parseArgs(opts.args ?? []);
  const url = parsed.positionals[0];
  if (!url) throw new Error("a page URL is required");
  const info = parsePageUrl(url);

  const email = flagValue(parsed, "--email") || process.env.CONFLUENCE_EMAIL;
  const apiToken = flagValue(parsed, "--api-token") || process.env.CONFLUENCE_API_TOKEN;
  const client = opts.client ?? fromEnv({ baseUrl: info.baseUrl, email, apiToken });

  const template = flagValue(parsed, "--name-template");
  const ctx: ExportContext = {
    prefix,
    client,
    converter: new Converter({
      imageFolder: flagValue(parsed, "--image-folder") ?? DEFAULT_IMAGE_FOLDER,
      resolver: new AttachmentService(client),
    }),
    images: hasFlag(parsed, "--no-images")
      ? undefined
      : new ImageDownloader({ email, apiToken, accessToken: process.env.CONFLUENCE_ACCESS_TOKEN }),
    namer: template ? templateNamer(template) : defaultFileName,
    withFrontmatter: !hasFlag(parsed, "--no-metadata"),
  };
  const outputDir = path.resolve(opts.cwd, flagValue(parsed, "--output") ?? ".");
  return { ctx, pageId: info.pageId, outputDir };
}

/** Convert one page into `dir`; returns the written path. */
async function exportPage(page: Page, dir: string, ctx: ExportContext): Promise<string> {
  const doc = await ctx.converter.convertPage(page, ctx.client.baseUrl);
  const outputPath = path.join(dir, generateFileName(page, ctx.namer));
  if (ctx.images && doc.images.length > 0) {
    await ctx.images.downloadImages(doc, dir);
    console.log(`${ctx.prefix} Downloaded ${doc.images.length} image(s) for "${page.title}"`);
  }
  saveMarkdownDocument(doc, outputPath, ctx.withFrontmatter);
  console.log(`${ctx.prefix} Wrote ${outputPath}`);
  return outputPath;
}

export async function exportSinglePage(opts: Options): Promise<string> {
  const { ctx, pageId, outputDir } = setup("[page]", opts);
  console.log(`[page] Fetching page ${pageId}...`);
  const page = await ctx.client.getPage(pageId);
  return exportPage(page, outputDir, ctx);
}

/**
 * Export a page and all of its descendants. Children of a page are written
 * to a directory named after the parent's slug.
 */
export async function exportTree(opts: Options): Promise<string[]> {
  const { ctx, pageId, outputDir } = setup("[tree]", opts);
  const written: string[] = [];

  const visit = async (id: string, dir: string): Promise<void> => {
    console.log(`[tree] Fetching page ${id}...`);
    // Child listings carry no attachments, so every page is fetched on its own.
    const page = await ctx.client.getPage(id);
    written.push(await exportPage(page, dir, ctx));

    const children = await ctx.client.getChildPages(id);
    const childDir = path.join(dir, slugify(page.title) || page.id);
    for (const child of children) {
      await visit(child.id, childDir);
    }
  };

  await visit(pageId, outputDir);
  console.log(`[tree] Exported ${written.length} page(s)`);
  return written;
}
