import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { INDUSTRIES } from "./vocabulary.js";

const DEFAULT_CLIENT_KEYWORDS = [
  "need app developer",
  "outsourcing software project",
  "mvp build",
  "looking for software agency",
  "hire developer for project",
  "build our app",
  "build my app",
  "contract developer",
  "prototype",
  "poc",
  "fixed bid",
  "seeking agency",
];

const DEFAULT_CANDIDATE_KEYWORDS = [
  "for hire",
  "open to work",
  "available for freelance",
  "available for contract",
  "seeking projects",
  "consultant available",
];

const KeywordsSchema = z.object({
  client: z.array(z.string().min(1)).default(DEFAULT_CLIENT_KEYWORDS),
  candidate: z.array(z.string().min(1)).default(DEFAULT_CANDIDATE_KEYWORDS),
});

const HackerNewsSourceSchema = z.object({
  enabled: z.boolean().default(true),
  max_pages: z.number().int().positive().default(3),
  hits_per_page: z.number().int().min(1).max(1000).default(100),
  page_delay_ms: z.number().int().nonnegative().default(250),
});

const RedditSourceSchema = z.object({
  subreddits: z.array(z.string().min(1)).min(1),
  limit: z.number().int().min(1).max(1000).default(120),
});

const RssSourceSchema = z.object({
  feeds: z.array(z.string().url()).min(1),
});

const SourcesSchema = z.object({
  hackernews: HackerNewsSourceSchema.optional(),
  reddit: RedditSourceSchema.optional(),
  rss: RssSourceSchema.optional(),
});

const HttpSchema = z.object({
  user_agent: z
    .string()
    .min(1)
    .default("LeadRadar/1.0 (+https://github.com/lead-radar/lead-radar)"),
  timeout_ms: z.number().int().positive().default(15_000),
});

const ConcurrencySchema = z.object({
  fetch: z.number().int().positive().default(12),
  enrich: z.number().int().positive().default(10),
});

const EnrichmentSchema = z.object({
  enabled: z.boolean().default(true),
  timeout_ms: z.number().int().positive().default(12_000),
});

const FiltersSchema = z.object({
  min_score: z.number().min(0).max(100).default(0),
  industries: z.array(z.enum(INDUSTRIES)).default([]),
  require_contact: z.boolean().default(false),
});

export const LeadRadarConfigSchema = z.object({
  keywords: KeywordsSchema.default({}),
  sources: SourcesSchema.refine(
    (s) => (s.hackernews && s.hackernews.enabled) || s.reddit || s.rss,
    "At least one source must be configured"
  ),
  recency_days: z.number().int().positive().default(30),
  http: HttpSchema.default({}),
  concurrency: ConcurrencySchema.default({}),
  enrichment: EnrichmentSchema.default({}),
  filters: FiltersSchema.default({}),
});

export type LeadRadarConfig = z.infer<typeof LeadRadarConfigSchema>;
export type LeadFilters = LeadRadarConfig["filters"];

export function parseConfig(yamlContent: string): LeadRadarConfig {
  const raw: unknown = parseYaml(yamlContent);
  return LeadRadarConfigSchema.parse(raw);
}

export function loadConfig(filePath: string): LeadRadarConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
