/**
 * html command: convert a storage-format file (or stdin) without talking to
 * Confluence. Diagram macros degrade to comments since there is no page.
 */

import fs from "fs";
import path from "path";
import { Converter, DEFAULT_IMAGE_FOLDER } from "../converter.js";
import { flagValue, parseArgs } from "./args.js";

interface Options {
  cwd: string;
  args?: string[];
  /** Source used when no file is given; process.stdin by default. */
  stdin?: NodeJS.ReadableStream;
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export async function convertHtmlFile(opts: Options): Promise<string> {
  const parsed = parseArgs(opts.args ?? []);
  const input = parsed.positionals[0];
  const html = input
    ? fs.readFileSync(path.resolve(opts.cwd, input), "utf8")
    : await readStream(opts.stdin ?? process.stdin);

  const converter = new Converter({ imageFolder: flagValue(parsed, "--image-folder") ?? DEFAULT_IMAGE_FOLDER });
  const markdown = converter.convertHtml(html) + "\n";

  const output = flagValue(parsed, "--output");
  if (output) {
    const outputPath = path.resolve(opts.cwd, output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, markdown, "utf8");
    console.log(`[html] Wrote ${outputPath}`);
  } else {
    process.stdout.write(markdown);
  }
  return markdown;
}
