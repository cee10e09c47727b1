import * as core from "@actions/core";
import Parser from "rss-parser";
import { htmlToText } from "../extract/html.js";
import { registrableDomain } from "../extract/signals.js";
import { isWithinWindow, parseTimestamp, type RunContext } from "../filter/recency.js";
import { describeError, fetchText, type HttpClient } from "./http.js";
import type { RawItem } from "./types.js";

interface FeedItemExtras {
  author?: string;
  summary?: string;
}

export type FeedParser = Pick<
  Parser<Record<string, unknown>, FeedItemExtras>,
  "parseString"
>;

export function createFeedParser(): FeedParser {
  return new Parser<Record<string, unknown>, FeedItemExtras>();
}

export async function collectFeed(
  feedUrl: string,
  ctx: RunContext,
  http: HttpClient,
  parser: FeedParser = createFeedParser()
): Promise<RawItem[]> {
  core.info(`Fetching feed: ${feedUrl}`);
  const result = await fetchText(http, feedUrl);
  if (!result.ok) {
    core.warning(`Failed to fetch feed: ${result.reason}`);
    return [];
  }

  let feed: Awaited<ReturnType<FeedParser["parseString"]>>;
  try {
    feed = await parser.parseString(result.value);
  } catch (error) {
    core.warning(`Failed to parse feed ${feedUrl}: ${describeError(error)}`);
    return [];
  }

  const sourceName = `RSS ${registrableDomain(feedUrl) ?? "feed"}`;
  const items: RawItem[] = [];

  for (const entry of feed.items) {
    const createdAt = parseTimestamp(entry.isoDate ?? entry.pubDate);
    if (!isWithinWindow(createdAt, ctx)) continue;

    items.push({
      source: "feed",
      sourceName,
      title: htmlToText(entry.title ?? ""),
      body: htmlToText(entry.summary ?? entry.content ?? entry.contentSnippet ?? ""),
      url: entry.link ?? "",
      author: entry.creator ?? entry.author,
      createdAt,
    });
  }

  core.info(`${sourceName}: ${items.length} items`);
  return items;
}
