/**
 * Confluence REST client.
 *
 * Why: Centralize HTTP handling, auth headers and the endpoints used by the
 * page and tree commands, and map REST payloads onto the `Page` model.
 */

import { URL } from "url";
import type { AttachmentDownloader } from "./attachments.js";
import { ConfluenceApiError } from "./errors.js";
import type { Attachment, Page, PageUser } from "./page.js";
import { VERSION } from "./version.js";

export interface ConfluenceClientOptions {
  baseUrl: string;
  email?: string;
  apiToken?: string;
  accessToken?: string; // optional bearer alternative
}

export interface AuthOptions {
  email?: string;
  apiToken?: string;
  accessToken?: string;
}

interface ApiUser {
  accountId?: string;
  displayName?: string;
  email?: string;
}

interface ApiAttachment {
  id?: string;
  title?: string;
  version?: { number?: number };
  extensions?: { mediaType?: string; fileSize?: number };
  _links?: { download?: string };
}

/** Shape of `/wiki/rest/api/content/{id}` with the expansions requested below. */
export interface ApiPage {
  id?: string;
  title?: string;
  body?: { storage?: { value?: string } };
  version?: { number?: number; when?: string; by?: ApiUser };
  space?: { key?: string };
  history?: { createdDate?: string; createdBy?: ApiUser };
  metadata?: { labels?: { results?: Array<{ name?: string }> } };
  children?: { attachment?: { results?: ApiAttachment[] } };
}

interface ApiPageList {
  results?: ApiPage[];
  start?: number;
  limit?: number;
  size?: number;
}

/** Read side of the client the page and tree commands depend on. */
export interface PageFetcher {
  getPage(pageId: string): Promise<Page>;
  getChildPages(pageId: string): Promise<Page[]>;
}

export interface PageUrlInfo {
  baseUrl: string;
  pageId: string;
  spaceKey: string;
  title: string;
}

const PAGE_EXPAND = "body.storage,metadata.labels,version,space,history,children.attachment";
const CHILD_PAGE_EXPAND = "body.storage,metadata.labels,version,space,history";
export const CHILD_PAGE_LIMIT = 100;

export function buildAuthHeader(opts: AuthOptions): Record<string, string> {
  if (opts.email && opts.apiToken) {
    const b64 = Buffer.from(`${opts.email}:${opts.apiToken}`).toString("base64");
    return { Authorization: `Basic ${b64}` };
  }
  if (opts.accessToken) {
    return { Authorization: `Bearer ${opts.accessToken}` };
  }
  return {};
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function toDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function toUser(user: ApiUser | undefined): PageUser | undefined {
  if (!user) return undefined;
  return { accountId: user.accountId, displayName: user.displayName ?? "", email: user.email };
}

function toAttachment(att: ApiAttachment): Attachment {
  return {
    id: att.id ?? "",
    title: att.title ?? "",
    mediaType: att.extensions?.mediaType ?? "",
    fileSize: att.extensions?.fileSize ?? 0,
    downloadLink: att._links?.download ?? "",
    version: att.version?.number ?? 0,
  };
}

export function pageFromApi(data: ApiPage): Page {
  return {
    id: data.id ?? "",
    title: data.title ?? "",
    spaceKey: data.space?.key ?? "",
    version: data.version?.number ?? 0,
    content: data.body?.storage?.value ?? "",
    labels: (data.metadata?.labels?.results ?? []).map((label) => label.name ?? "").filter(Boolean),
    attachments: (data.children?.attachment?.results ?? []).map(toAttachment),
    createdBy: toUser(data.history?.createdBy),
    updatedBy: toUser(data.version?.by),
    createdAt: toDate(data.history?.createdDate),
    updatedAt: toDate(data.version?.when),
  };
}

/**
 * Split a page URL such as
 * https://example.atlassian.net/wiki/spaces/SPACE/pages/12345/Title
 * into the instance base URL, page ID, space key and trailing title segment.
 */
export function parsePageUrl(pageUrl: string): PageUrlInfo {
  if (!pageUrl) throw new Error("URL is empty");
  let url: URL;
  try {
    url = new URL(pageUrl);
  } catch {
    throw new Error(`invalid URL: ${pageUrl}`);
  }

  const parts = url.pathname.split("/");
  let pageId = "";
  let spaceKey = "";
  parts.forEach((part, i) => {
    if (part === "spaces" && i + 1 < parts.length) spaceKey = parts[i + 1] ?? "";
    if (part === "pages" && i + 1 < parts.length) pageId = parts[i + 1] ?? "";
  });
  if (!pageId) throw new Error("could not extract page ID from URL");

  return {
    baseUrl: `${url.protocol}//${url.host}`,
    pageId,
    spaceKey,
    title: parts[parts.length - 1] ?? "",
  };
}

export class ConfluenceClient implements AttachmentDownloader, PageFetcher {
  private readonly base: string;
  private readonly headers: Record<string, string>;

  constructor(opts: ConfluenceClientOptions) {
    this.base = opts.baseUrl.replace(/\/$/, "");
    this.headers = {
      Accept: "application/json",
      "User-Agent": `confluence-storage-md/${VERSION}`,
      ...buildAuthHeader(opts),
    };
  }

  get baseUrl(): string {
    return this.base;
  }

  private buildV1(pathname: string, query: Record<string, string | number | undefined> = {}): string {
    const u = new URL("/wiki/rest/api" + pathname, this.base);
    for (const [k, v] of Object.entries(query)) {
      if (v !== undefined) u.searchParams.set(k, String(v));
    }
    return u.toString();
  }

  /** Map a non-2xx response to `failed to <operation>: ...`, preferring the API's own message. */
  private async errorFor(res: Response, operation: string): Promise<ConfluenceApiError> {
    const text = await res.text();
    const parsed = parseJson(text);
    if (parsed && typeof parsed === "object" && "message" in parsed && typeof parsed.message === "string") {
      return new ConfluenceApiError(operation, `failed to ${operation}: ${parsed.message}`, res.status);
    }
    return new ConfluenceApiError(operation, `failed to ${operation}: HTTP ${res.status} - ${text}`, res.status);
  }

  async getPage(pageId: string): Promise<Page> {
    const url = this.buildV1(`/content/${pageId}`, { expand: PAGE_EXPAND });
    const res = await fetch(url, { headers: this.headers });
    if (!res.ok) throw await this.errorFor(res, `get page ${pageId}`);
    const data: ApiPage = await res.json();
    return pageFromApi(data);
  }

  /** All direct children of `pageId`, following `start`/`limit` pagination. */
  async getChildPages(pageId: string): Promise<Page[]> {
    const pages: Page[] = [];
    let start = 0;
    for (;;) {
      const url = this.buildV1(`/content/${pageId}/child/page`, {
        expand: CHILD_PAGE_EXPAND,
        limit: CHILD_PAGE_LIMIT,
        start,
      });
      const res = await fetch(url, { headers: this.headers });
      if (!res.ok) throw await this.errorFor(res, `get child pages for ${pageId}`);
      const data: ApiPageList = await res.json();
      const results = data.results ?? [];
      pages.push(...results.map(pageFromApi));

      const limit = data.limit && data.limit > 0 ? data.limit : CHILD_PAGE_LIMIT;
      if (results.length === 0 || results.length < limit) break;
      start += limit;
    }
    return pages;
  }

  /**
   * Absolute URL for an attachment download link. The REST API returns
   * links such as `/download/attachments/1/a b.png` relative to `/wiki`.
   */
  normalizeDownloadLink(link: string): string {
    if (/^https?:\/\//i.test(link)) return link;
    let pathname = link.startsWith("/") ? link : "/" + link;
    if (pathname.startsWith("/download/")) pathname = "/wiki" + pathname;
    pathname = pathname.replace(/ /g, "%20");
    return new URL(this.base + pathname).toString();
  }

  async downloadAttachmentContent(attachment: Attachment): Promise<Buffer> {
    if (!attachment.downloadLink) {
      throw new ConfluenceApiError("download attachment", `attachment ${attachment.title} has no download link`);
    }
    const url = this.normalizeDownloadLink(attachment.downloadLink);
    const res = await fetch(url, { headers: { ...this.headers, Accept: "*/*" } });
    if (res.status !== 200) {
      throw new ConfluenceApiError("download attachment", `HTTP ${res.status} while downloading attachment`, res.status);
    }
    return Buffer.from(await res.arrayBuffer());
  }
}

export function fromEnv(overrides: Partial<ConfluenceClientOptions> = {}): ConfluenceClient {
  const baseUrl = overrides.baseUrl || process.env.CONFLUENCE_BASE_URL || process.env.CONFLUENCE_URL || "";
  if (!baseUrl) throw new Error("CONFLUENCE_BASE_URL (or CONFLUENCE_URL) must be set");
  return new ConfluenceClient({
    baseUrl,
    email: overrides.email || process.env.CONFLUENCE_EMAIL,
    apiToken: overrides.apiToken || process.env.CONFLUENCE_API_TOKEN,
    accessToken: overrides.accessToken || process.env.CONFLUENCE_ACCESS_TOKEN,
  });
}
