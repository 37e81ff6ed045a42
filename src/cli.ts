#!/usr/bin/env node
/**
 * CLI entrypoint
 *
 * Why: Export Confluence pages (or raw storage-format files) as Markdown with
 * frontmatter and local images.
 *
 * How: Subcommands dispatch to dedicated modules. Credentials come from flags
 * or process.env (optionally loaded from .env).
 */

import dotenv from "dotenv";
import { convertHtmlFile } from "./commands/html.js";
import { exportSinglePage, exportTree } from "./commands/page.js";
import { errorMessage } from "./errors.js";
import { VERSION } from "./version.js";

dotenv.config();

function printHelp() {
  console.log(
    [
      "Confluence storage → Markdown",
      "",
      "Usage:",
      "  confluence-storage-md page <url> [options]     # Convert one page",
      "  confluence-storage-md convert <url> [options]  # Alias for 'page'",
      "  confluence-storage-md tree <url> [options]     # Convert a page and all descendants",
      "  confluence-storage-md html [file] [--output <file>] [--image-folder <dir>]",
      "  confluence-storage-md version",
      "",
      "Options:",
      "  --output <dir>           Output directory (default: .)",
      "  --image-folder <dir>     Image folder relative to the Markdown file (default: assets)",
      "  --no-images              Do not download images",
      "  --no-metadata            Omit YAML frontmatter",
      "  --name-template <tpl>    File name template: {title} {slug} {id} {space} {version}",
      "  --email <email>          Overrides CONFLUENCE_EMAIL",
      "  --api-token <token>      Overrides CONFLUENCE_API_TOKEN",
      "",
      "Env:",
      "  CONFLUENCE_BASE_URL, CONFLUENCE_EMAIL, CONFLUENCE_API_TOKEN or CONFLUENCE_ACCESS_TOKEN",
    ].join("\n")
  );
}

async function main() {
  const [, , cmd, ...args] = process.argv;
  switch (cmd) {
    case "page":
    case "convert":
      await exportSinglePage({ cwd: process.cwd(), args });
      break;
    case "tree":
      await exportTree({ cwd: process.cwd(), args });
      break;
    case "html":
      await convertHtmlFile({ cwd: process.cwd(), args });
      break;
    case "version":
    case "--version":
      console.log(VERSION);
      break;
    case "-h":
    case "--help":
    default:
      printHelp();
  }
}

main().catch((err) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
