import * as core from "@actions/core";
import { beforeEach, describe, it, expect, vi } from "vitest";
import {
  buildQuery,
  buildSearchUrl,
  collectHackerNews,
} from "../../src/sources/hackernews.js";
import { ctx, daysAgo, sequenceFetch, stubHttp } from "../fixtures/helpers.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  debug: vi.fn(),
}));

const keywords = ["need developer", "for hire"];
const options = { enabled: true, max_pages: 3, hits_per_page: 50, page_delay_ms: 0 };

beforeEach(() => {
  vi.clearAllMocks();
});

describe("buildQuery", () => {
  it("quotes each phrase and joins with OR", () => {
    expect(buildQuery(keywords)).toBe('"need developer" OR "for hire"');
  });
});

describe("buildSearchUrl", () => {
  it("restricts the search to stories inside the window", () => {
    const url = new URL(buildSearchUrl(keywords, ctx, 2, 50));
    expect(url.origin + url.pathname).toBe("https://hn.algolia.com/api/v1/search_by_date");
    expect(url.searchParams.get("query")).toBe('"need developer" OR "for hire"');
    expect(url.searchParams.get("tags")).toBe("story");
    expect(url.searchParams.get("numericFilters")).toBe("created_at_i>1772366400");
    expect(url.searchParams.get("hitsPerPage")).toBe("50");
    expect(url.searchParams.get("page")).toBe("2");
  });
});

describe("collectHackerNews", () => {
  it("maps hits, drops old ones and stops at an empty page", async () => {
    const firstPage = {
      hits: [
        {
          objectID: "1",
          title: "Ask HN: need developer for MVP",
          url: null,
          story_text: "<p>We are a &amp; team</p>",
          author: "pg",
          created_at: daysAgo(2).toISOString(),
          points: 5,
          num_comments: 2,
        },
        { objectID: "2", title: "Old", created_at: daysAgo(40).toISOString() },
        {
          objectID: "3",
          title: "Show HN: Acme",
          url: "https://acme.io",
          created_at: daysAgo(1).toISOString(),
          points: null,
        },
      ],
    };
    const fetchFn = vi.fn(
      sequenceFetch([{ body: JSON.stringify(firstPage) }, { body: JSON.stringify({ hits: [] }) }])
    );

    const items = await collectHackerNews(keywords, options, ctx, stubHttp(fetchFn));

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(items).toEqual([
      {
        source: "hackernews",
        sourceName: "Hacker News",
        title: "Ask HN: need developer for MVP",
        body: "We are a & team",
        url: "https://news.ycombinator.com/item?id=1",
        author: "pg",
        createdAt: daysAgo(2),
        points: 5,
        comments: 2,
      },
      {
        source: "hackernews",
        sourceName: "Hacker News",
        title: "Show HN: Acme",
        body: "",
        url: "https://acme.io",
        author: undefined,
        createdAt: daysAgo(1),
        points: 0,
        comments: 0,
      },
    ]);
    expect(core.info).toHaveBeenCalledWith("Hacker News: 2 items");
  });

  it("stops after max_pages", async () => {
    const page = JSON.stringify({
      hits: [{ objectID: "9", title: "need developer", created_at: daysAgo(1).toISOString() }],
    });
    const fetchFn = vi.fn(sequenceFetch([{ body: page }, { body: page }, { body: page }]));

    const items = await collectHackerNews(keywords, { ...options, max_pages: 2 }, ctx, stubHttp(fetchFn));

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(items).toHaveLength(2);
  });

  it("warns and returns nothing on an HTTP error", async () => {
    const http = stubHttp(sequenceFetch([{ status: 500, body: "oops" }]));

    const items = await collectHackerNews(keywords, options, ctx, http);

    expect(items).toEqual([]);
    expect(core.warning).toHaveBeenCalledWith(
      `Hacker News search failed: HTTP 500 for ${buildSearchUrl(keywords, ctx, 0, 50)}`
    );
  });

  it("treats an unexpected payload as a failure", async () => {
    const http = stubHttp(sequenceFetch([{ body: JSON.stringify({ hits: "nope" }) }]));

    const items = await collectHackerNews(keywords, options, ctx, http);

    expect(items).toEqual([]);
    expect(core.warning).toHaveBeenCalledWith(
      expect.stringMatching(/^Hacker News search failed: Unexpected payload from /)
    );
  });

  it("does not search without keywords", async () => {
    const fetchFn = vi.fn(sequenceFetch([]));
    expect(await collectHackerNews([], options, ctx, stubHttp(fetchFn))).toEqual([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
