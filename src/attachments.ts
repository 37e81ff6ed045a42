/**
 * Attachment lookup for macros that embed attachment content (mermaid-cloud).
 *
 * How: Candidates are matched by title, filtered by revision, then ranked so
 * that text-like attachments beat rendered images of the same diagram.
 */

import path from "path";
import { AttachmentNotFoundError, AttachmentResolutionError } from "./errors.js";
import type { Attachment, Page } from "./page.js";

export interface AttachmentDownloader {
  downloadAttachmentContent(attachment: Attachment): Promise<Buffer>;
}

export interface AttachmentResolver {
  resolve(page: Page | undefined, filename: string, revision: number): Promise<string>;
}

const TEXT_EXTENSIONS = new Set([".mmd", ".mermaid", ".txt", ".md", ".json"]);
const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".gif", ".svg"]);

export function matchesAttachmentFilename(title: string, filename: string): boolean {
  if (!title || !filename) return false;
  if (title.toLowerCase() === filename.toLowerCase()) return true;
  if (!filename.includes(".")) {
    const stem = title.slice(0, title.length - path.extname(title).length);
    return stem.toLowerCase() === filename.toLowerCase();
  }
  return false;
}

export function attachmentPreferenceScore(attachment: Attachment): number {
  let score = 0;
  const mediaType = attachment.mediaType.toLowerCase();
  if (mediaType.includes("text") || mediaType.includes("json")) score += 100;
  if (mediaType.startsWith("image/")) score -= 100;
  const ext = path.extname(attachment.title).toLowerCase();
  if (TEXT_EXTENSIONS.has(ext)) score += 80;
  if (IMAGE_EXTENSIONS.has(ext)) score -= 50;
  return score;
}

/**
 * Best attachment for `filename`. A positive revision only excludes
 * attachments that carry a different version; unversioned ones stay eligible.
 */
export function selectAttachment(attachments: Attachment[], filename: string, revision: number): Attachment | undefined {
  const candidates = attachments.filter((att) => {
    if (!matchesAttachmentFilename(att.title, filename)) return false;
    return !(revision > 0 && att.version > 0 && att.version !== revision);
  });

  let best: Attachment | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const candidate of candidates) {
    const score = attachmentPreferenceScore(candidate);
    if (best === undefined || score > bestScore || (score === bestScore && candidate.version > best.version)) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

export class AttachmentService implements AttachmentResolver {
  constructor(private readonly downloader?: AttachmentDownloader) {}

  async resolve(page: Page | undefined, filename: string, revision: number): Promise<string> {
    if (!this.downloader) throw new AttachmentResolutionError("attachment downloader is not configured");
    if (!page) throw new AttachmentResolutionError("page context not provided");

    const attachment = selectAttachment(page.attachments, filename, revision);
    if (!attachment) throw new AttachmentNotFoundError(filename);

    const data = await this.downloader.downloadAttachmentContent(attachment);
    return data.toString("utf8");
  }
}
