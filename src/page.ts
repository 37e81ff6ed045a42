/**
 * Page and attachment model shared by the client, the converter and the
 * attachment resolver.
 */

import { PageValidationError } from "./errors.js";

export interface PageUser {
  accountId?: string;
  displayName: string;
  email?: string;
}

export interface Attachment {
  id: string;
  title: string;
  mediaType: string;
  fileSize: number;
  downloadLink: string;
  version: number;
}

export interface Page {
  id: string;
  title: string;
  spaceKey: string;
  version: number;
  /** Storage-format XHTML body. */
  content: string;
  labels: string[];
  attachments: Attachment[];
  createdBy?: PageUser;
  updatedBy?: PageUser;
  createdAt?: Date;
  updatedAt?: Date;
}

function isValidDownloadLink(link: string): boolean {
  if (/^https?:\/\//i.test(link)) {
    try {
      new URL(link);
      return true;
    } catch {
      return false;
    }
  }
  // Relative locators are paths on the Confluence host; any other scheme is rejected.
  return !/^[a-z][a-z0-9+.-]*:/i.test(link) && !/[\r\n]/.test(link);
}

export function validateAttachment(attachment: Attachment): void {
  if (!attachment.id) throw new PageValidationError("attachment ID cannot be empty");
  if (!attachment.title) throw new PageValidationError("attachment title cannot be empty");
  if (!attachment.mediaType) throw new PageValidationError("attachment media type cannot be empty");
  if (!(attachment.fileSize > 0)) throw new PageValidationError("attachment file size must be greater than 0");
  if (!attachment.downloadLink) throw new PageValidationError("attachment download link cannot be empty");
  if (!isValidDownloadLink(attachment.downloadLink)) {
    throw new PageValidationError(`invalid download link: ${attachment.downloadLink}`);
  }
}

/**
 * Throw a PageValidationError naming the first missing field.
 * Attachments are checked last so a broken body is reported before them.
 */
export function validatePage(page: Page): void {
  if (!page.id) throw new PageValidationError("page ID cannot be empty");
  if (!page.title) throw new PageValidationError("page title cannot be empty");
  if (!page.content) throw new PageValidationError("page content cannot be empty");
  if (!page.spaceKey) throw new PageValidationError("space key cannot be empty");
  page.attachments.forEach((attachment, index) => {
    try {
      validateAttachment(attachment);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PageValidationError(`invalid attachment ${index}: ${reason}`);
    }
  });
}

export function pageLabelNames(page: Page): string[] {
  return page.labels.filter((label) => label.length > 0);
}

export function pageUrl(page: Page, baseUrl: string): string {
  const base = baseUrl.trim().replace(/\/+$/, "");
  if (!base) throw new PageValidationError("base URL cannot be empty");
  return `${base}/wiki/spaces/${page.spaceKey}/pages/${page.id}/${encodeURIComponent(page.title)}`;
}
