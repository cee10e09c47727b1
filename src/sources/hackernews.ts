import * as core from "@actions/core";
import { z } from "zod";
import type { LeadRadarConfig } from "../config.js";
import { htmlToText } from "../extract/html.js";
import { isWithinWindow, parseTimestamp, type RunContext } from "../filter/recency.js";
import { fetchJson, type HttpClient } from "./http.js";
import type { RawItem } from "./types.js";

const HN_SEARCH_URL = "https://hn.algolia.com/api/v1/search_by_date";

const HitSchema = z.object({
  objectID: z.string(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  story_text: z.string().nullish(),
  author: z.string().nullish(),
  created_at: z.string().nullish(),
  points: z.number().nullish(),
  num_comments: z.number().nullish(),
});

const SearchResponseSchema = z.object({
  hits: z.array(HitSchema),
});

type HackerNewsOptions = NonNullable<LeadRadarConfig["sources"]["hackernews"]>;

function buildQuery(keywords: string[]): string {
  return keywords.map((kw) => `"${kw}"`).join(" OR ");
}

function buildSearchUrl(
  keywords: string[],
  ctx: RunContext,
  page: number,
  hitsPerPage: number
): string {
  const url = new URL(HN_SEARCH_URL);
  url.searchParams.set("query", buildQuery(keywords));
  url.searchParams.set("tags", "story");
  url.searchParams.set(
    "numericFilters",
    `created_at_i>${Math.floor(ctx.earliest.getTime() / 1000)}`
  );
  url.searchParams.set("hitsPerPage", String(hitsPerPage));
  url.searchParams.set("page", String(page));
  return url.toString();
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function collectHackerNews(
  keywords: string[],
  options: HackerNewsOptions,
  ctx: RunContext,
  http: HttpClient
): Promise<RawItem[]> {
  if (keywords.length === 0) return [];

  const items: RawItem[] = [];

  for (let page = 0; page < options.max_pages; page++) {
    const url = buildSearchUrl(keywords, ctx, page, options.hits_per_page);
    const result = await fetchJson(http, url, SearchResponseSchema);
    if (!result.ok) {
      core.warning(`Hacker News search failed: ${result.reason}`);
      break;
    }

    const { hits } = result.value;
    for (const hit of hits) {
      const createdAt = parseTimestamp(hit.created_at);
      if (!isWithinWindow(createdAt, ctx)) continue;

      items.push({
        source: "hackernews",
        sourceName: "Hacker News",
        title: hit.title ?? "",
        body: hit.story_text ? htmlToText(hit.story_text) : "",
        url: hit.url || `https://news.ycombinator.com/item?id=${hit.objectID}`,
        author: hit.author ?? undefined,
        createdAt,
        points: hit.points ?? 0,
        comments: hit.num_comments ?? 0,
      });
    }

    if (hits.length === 0) break;
    if (page + 1 < options.max_pages && options.page_delay_ms > 0) {
      await sleep(options.page_delay_ms);
    }
  }

  core.info(`Hacker News: ${items.length} items`);
  return items;
}

export { buildQuery, buildSearchUrl };
