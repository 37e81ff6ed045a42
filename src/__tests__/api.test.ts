import { afterEach, describe, it, expect, vi } from "vitest";
import { ConfluenceClient, buildAuthHeader, fromEnv, pageFromApi, parsePageUrl, type ApiPage } from "../api.js";
import { ConfluenceApiError } from "../errors.js";
import type { Attachment } from "../page.js";

const BASE = "https://example.atlassian.net";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) throw new Error("unexpected request");
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const apiPage: ApiPage = {
  id: "123",
  title: "Test Page",
  body: { storage: { value: "<p>Hello</p>" } },
  version: { number: 4, when: "2024-05-01T10:20:30.000Z", by: { accountId: "u2", displayName: "Bo" } },
  space: { key: "DOC" },
  history: { createdDate: "2024-01-01T00:00:00.000Z", createdBy: { accountId: "u1", displayName: "Ada" } },
  metadata: { labels: { results: [{ name: "alpha" }, { name: "" }] } },
  children: {
    attachment: {
      results: [
        {
          id: "att1",
          title: "flow.mmd",
          version: { number: 2 },
          extensions: { mediaType: "text/plain", fileSize: 12 },
          _links: { download: "/download/attachments/123/flow.mmd" },
        },
      ],
    },
  },
};

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});

describe("buildAuthHeader", () => {
  it("prefers basic auth with email and API token", () => {
    const expected = `Basic ${Buffer.from("user@example.com:test-secret").toString("base64")}`;
    expect(buildAuthHeader({ email: "user@example.com", apiToken: "test-secret", accessToken: "other" })).toEqual({
      Authorization: expected,
    });
  });

  it("falls back to a bearer token, then to no header", () => {
    expect(buildAuthHeader({ accessToken: "test-token" })).toEqual({ Authorization: "Bearer test-token" });
    expect(buildAuthHeader({ email: "user@example.com" })).toEqual({});
  });
});

describe("parsePageUrl", () => {
  it("splits a page URL", () => {
    expect(parsePageUrl(`${BASE}/wiki/spaces/DOC/pages/12345/Some+Title`)).toEqual({
      baseUrl: BASE,
      pageId: "12345",
      spaceKey: "DOC",
      title: "Some+Title",
    });
  });

  it("rejects empty, malformed and page-less URLs", () => {
    expect(() => parsePageUrl("")).toThrow("URL is empty");
    expect(() => parsePageUrl("not a url")).toThrow("invalid URL: not a url");
    expect(() => parsePageUrl(`${BASE}/wiki/spaces/DOC/overview`)).toThrow("could not extract page ID from URL");
  });
});

describe("pageFromApi", () => {
  it("maps the REST payload onto the page model", () => {
    const page = pageFromApi(apiPage);
    expect(page).toMatchObject({
      id: "123",
      title: "Test Page",
      spaceKey: "DOC",
      version: 4,
      content: "<p>Hello</p>",
      labels: ["alpha"],
      createdBy: { accountId: "u1", displayName: "Ada" },
      updatedBy: { accountId: "u2", displayName: "Bo" },
    });
    expect(page.attachments).toEqual([
      {
        id: "att1",
        title: "flow.mmd",
        mediaType: "text/plain",
        fileSize: 12,
        downloadLink: "/download/attachments/123/flow.mmd",
        version: 2,
      },
    ]);
    expect(page.updatedAt?.toISOString()).toBe("2024-05-01T10:20:30.000Z");
  });

  it("fills missing fields with empty values", () => {
    expect(pageFromApi({})).toEqual({
      id: "",
      title: "",
      spaceKey: "",
      version: 0,
      content: "",
      labels: [],
      attachments: [],
      createdBy: undefined,
      updatedBy: undefined,
      createdAt: undefined,
      updatedAt: undefined,
    });
  });
});

describe("ConfluenceClient", () => {
  const client = new ConfluenceClient({ baseUrl: `${BASE}/`, email: "user@example.com", apiToken: "test-secret" });

  it("fetches a page with its body, labels and attachments", async () => {
    const fetchMock = stubFetch(jsonResponse(apiPage));

    const page = await client.getPage("123");

    expect(page.title).toBe("Test Page");
    const [url, init] = fetchMock.mock.calls[0];
    const parsed = new URL(url);
    expect(parsed.pathname).toBe("/wiki/rest/api/content/123");
    expect(parsed.searchParams.get("expand")).toBe(
      "body.storage,metadata.labels,version,space,history,children.attachment",
    );
    expect(init?.headers).toMatchObject({ Accept: "application/json", Authorization: expect.stringMatching(/^Basic /) });
  });

  it("uses the API's error message when there is one", async () => {
    stubFetch(jsonResponse({ message: "No content found with id 9" }, 404));
    const err = await client.getPage("9").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfluenceApiError);
    expect(err).toMatchObject({ message: "failed to get page 9: No content found with id 9", status: 404 });
  });

  it("falls back to the status and body text", async () => {
    stubFetch(new Response("boom", { status: 500 }));
    await expect(client.getPage("9")).rejects.toThrow("failed to get page 9: HTTP 500 - boom");
  });

  it("follows child page pagination", async () => {
    const child = (id: string): ApiPage => ({ ...apiPage, id, children: undefined });
    const fetchMock = stubFetch(
      jsonResponse({ results: [child("1"), child("2")], start: 0, limit: 2, size: 2 }),
      jsonResponse({ results: [child("3")], start: 2, limit: 2, size: 1 }),
    );

    const pages = await client.getChildPages("123");

    expect(pages.map((p) => p.id)).toEqual(["1", "2", "3"]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const second = new URL(fetchMock.mock.calls[1][0]);
    expect(second.pathname).toBe("/wiki/rest/api/content/123/child/page");
    expect(second.searchParams.get("start")).toBe("2");
  });

  it("stops after an empty page of children", async () => {
    const fetchMock = stubFetch(jsonResponse({ results: [] }));
    await expect(client.getChildPages("123")).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("normalizes attachment download links", () => {
    expect(client.normalizeDownloadLink("/download/attachments/1/a b.png")).toBe(
      `${BASE}/wiki/download/attachments/1/a%20b.png`,
    );
    expect(client.normalizeDownloadLink("https://cdn.example.com/a.png")).toBe("https://cdn.example.com/a.png");
  });

  describe("downloadAttachmentContent", () => {
    const attachment: Attachment = {
      id: "att1",
      title: "flow.mmd",
      mediaType: "text/plain",
      fileSize: 12,
      downloadLink: "/download/attachments/123/flow.mmd",
      version: 2,
    };

    it("returns the attachment bytes", async () => {
      const fetchMock = stubFetch(new Response("graph TD;"));
      const data = await client.downloadAttachmentContent(attachment);
      expect(data.toString("utf8")).toBe("graph TD;");
      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}/wiki/download/attachments/123/flow.mmd`);
    });

    it("rejects non-200 responses", async () => {
      stubFetch(new Response("", { status: 404 }));
      await expect(client.downloadAttachmentContent(attachment)).rejects.toThrow(
        "HTTP 404 while downloading attachment",
      );
    });

    it("requires a download link", async () => {
      await expect(client.downloadAttachmentContent({ ...attachment, downloadLink: "" })).rejects.toThrow(
        "attachment flow.mmd has no download link",
      );
    });
  });
});

describe("fromEnv", () => {
  it("reads the base URL and credentials from the environment", () => {
    vi.stubEnv("CONFLUENCE_BASE_URL", BASE);
    expect(fromEnv().baseUrl).toBe(BASE);
  });

  it("prefers explicit overrides", () => {
    vi.stubEnv("CONFLUENCE_BASE_URL", BASE);
    expect(fromEnv({ baseUrl: "https://other.atlassian.net" }).baseUrl).toBe("https://other.atlassian.net");
  });

  it("requires a base URL", () => {
    vi.stubEnv("CONFLUENCE_BASE_URL", "");
    vi.stubEnv("CONFLUENCE_URL", "");
    expect(() => fromEnv()).toThrow("CONFLUENCE_BASE_URL (or CONFLUENCE_URL) must be set");
  });
});
