import * as core from "@actions/core";
import { z } from "zod";
import { decodeEntities } from "../extract/html.js";
import { isWithinWindow, parseTimestamp, type RunContext } from "../filter/recency.js";
import { fetchJson, type HttpClient } from "./http.js";
import type { RawItem } from "./types.js";

const RedditPostSchema = z.object({
  title: z.string().nullish(),
  selftext: z.string().nullish(),
  created_utc: z.number().nullish(),
  permalink: z.string().nullish(),
  author: z.string().nullish(),
  score: z.number().nullish(),
  num_comments: z.number().nullish(),
});

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: RedditPostSchema })),
  }),
});

export function buildListingUrl(subreddit: string, limit: number): string {
  return `https://www.reddit.com/r/${encodeURIComponent(subreddit)}/new.json?limit=${limit}`;
}

export async function collectSubreddit(
  subreddit: string,
  limit: number,
  ctx: RunContext,
  http: HttpClient
): Promise<RawItem[]> {
  const result = await fetchJson(http, buildListingUrl(subreddit, limit), ListingSchema);
  if (!result.ok) {
    core.warning(`Reddit r/${subreddit} failed: ${result.reason}`);
    return [];
  }

  const items: RawItem[] = [];
  for (const { data: post } of result.value.data.children) {
    const createdAt = parseTimestamp(post.created_utc);
    if (!isWithinWindow(createdAt, ctx)) continue;

    items.push({
      source: "reddit",
      sourceName: `Reddit r/${subreddit}`,
      title: decodeEntities(post.title ?? ""),
      body: decodeEntities(post.selftext ?? ""),
      url: `https://www.reddit.com${post.permalink ?? ""}`,
      author: post.author ?? undefined,
      createdAt,
      points: post.score ?? undefined,
      comments: post.num_comments ?? undefined,
      channel: subreddit,
    });
  }

  core.info(`Reddit r/${subreddit}: ${items.length} items`);
  return items;
}
