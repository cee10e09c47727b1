import * as core from "@actions/core";
import pLimit from "p-limit";
import type { LeadRadarConfig } from "../config.js";
import type { RunContext } from "../filter/recency.js";
import { collectFeed } from "./feeds.js";
import { collectHackerNews } from "./hackernews.js";
import { describeError, type HttpClient } from "./http.js";
import { collectSubreddit } from "./reddit.js";
import type { RawItem } from "./types.js";

export interface SourceTask {
  name: string;
  run: () => Promise<RawItem[]>;
}

export function planSources(
  config: LeadRadarConfig,
  ctx: RunContext,
  http: HttpClient
): SourceTask[] {
  const tasks: SourceTask[] = [];
  const { hackernews, reddit, rss } = config.sources;

  if (hackernews?.enabled) {
    const keywords = [...config.keywords.client, ...config.keywords.candidate];
    tasks.push({
      name: "Hacker News",
      run: () => collectHackerNews(keywords, hackernews, ctx, http),
    });
  }

  for (const subreddit of new Set(reddit?.subreddits ?? [])) {
    const limit = reddit?.limit ?? 120;
    tasks.push({
      name: `Reddit r/${subreddit}`,
      run: () => collectSubreddit(subreddit, limit, ctx, http),
    });
  }

  for (const feedUrl of new Set(rss?.feeds ?? [])) {
    tasks.push({ name: `RSS ${feedUrl}`, run: () => collectFeed(feedUrl, ctx, http) });
  }

  return tasks;
}

/** Runs every task in a bounded pool; a rejected task contributes nothing. */
export async function runSourceTasks(
  tasks: SourceTask[],
  concurrency: number
): Promise<RawItem[]> {
  const limit = pLimit(concurrency);
  const results = await Promise.allSettled(tasks.map((task) => limit(task.run)));

  const items: RawItem[] = [];
  results.forEach((result, i) => {
    if (result.status === "rejected") {
      core.warning(`Source ${tasks[i].name} failed: ${describeError(result.reason)}`);
      return;
    }
    items.push(...result.value);
  });
  return items;
}

export async function collectAll(
  config: LeadRadarConfig,
  ctx: RunContext,
  http: HttpClient
): Promise<RawItem[]> {
  const tasks = planSources(config, ctx, http);
  core.info(`Scheduling ${tasks.length} source tasks`);
  return runSourceTasks(tasks, config.concurrency.fetch);
}
