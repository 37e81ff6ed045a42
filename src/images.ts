/**
 * Fetches the images a converted document refers to and records their
 * content type and size on the document's image manifest.
 */

import fs from "fs";
import path from "path";
import { buildAuthHeader, type AuthOptions } from "./api.js";
import { errorMessage } from "./errors.js";
import type { ImageRef, MarkdownDocument } from "./markdown-document.js";

export const DEFAULT_MAX_IMAGE_SIZE = 10 * 1024 * 1024;

export interface ImageDownloaderOptions extends AuthOptions {
  maxSize?: number;
  verbose?: boolean;
}

export class ImageDownloader {
  private readonly headers: Record<string, string>;
  private readonly maxSize: number;
  private readonly verbose: boolean;

  constructor(opts: ImageDownloaderOptions = {}) {
    this.headers = { Accept: "*/*", ...buildAuthHeader(opts) };
    this.maxSize = opts.maxSize ?? DEFAULT_MAX_IMAGE_SIZE;
    this.verbose = opts.verbose ?? false;
  }

  /** Download every image of `doc` below `outputDir`, updating each ImageRef in place. */
  async downloadImages(doc: MarkdownDocument, outputDir: string): Promise<void> {
    for (const image of doc.images) {
      try {
        await this.downloadImage(image, outputDir);
      } catch (err) {
        throw new Error(`failed to download image ${image.originalUrl}: ${errorMessage(err)}`);
      }
    }
  }

  private async downloadImage(image: ImageRef, outputDir: string): Promise<void> {
    const res = await fetch(image.originalUrl, { headers: this.headers });
    if (res.status !== 200) throw new Error(`HTTP ${res.status}`);

    const declared = Number(res.headers.get("content-length") ?? "0");
    if (declared > this.maxSize) {
      throw new Error(`image too large: ${declared} bytes (max ${this.maxSize})`);
    }
    const data = Buffer.from(await res.arrayBuffer());
    if (data.length > this.maxSize) {
      throw new Error(`image too large: ${data.length} bytes (max ${this.maxSize})`);
    }

    const filePath = path.join(outputDir, image.localPath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, data);

    image.contentType = res.headers.get("content-type") ?? undefined;
    image.size = data.length;
    if (this.verbose) console.log(`[images] ${image.fileName} → ${filePath} (${data.length} bytes)`);
  }
}
