import * as core from "@actions/core";
import type { LeadRadarConfig } from "./config.js";
import { classifyItems } from "./classifier/leads.js";
import { profileCandidate } from "./enrich/profile.js";
import type { EnrichedClients, EnrichmentOptions } from "./enrich/site.js";
import { dedupCandidates, dedupClients } from "./filter/dedup.js";
import type { RunContext } from "./filter/recency.js";
import { filterCandidates, filterClients } from "./filter/thresholds.js";
import { rankByScore } from "./output/rank.js";
import type { HttpClient } from "./sources/http.js";
import type { LeadReport, RawItem, Scored } from "./sources/types.js";

export interface PipelineDeps {
  collect: (
    config: LeadRadarConfig,
    ctx: RunContext,
    http: HttpClient
  ) => Promise<RawItem[]>;
  enrich: (
    clients: Scored<"client">[],
    options: EnrichmentOptions,
    http: HttpClient,
    ctx: RunContext
  ) => Promise<EnrichedClients>;
  output: (report: LeadReport, dryRun: boolean) => Promise<void>;
}

export interface PipelineOptions {
  ctx: RunContext;
  http: HttpClient;
  dryRun: boolean;
}

export async function runPipeline(
  config: LeadRadarConfig,
  deps: PipelineDeps,
  { ctx, http, dryRun }: PipelineOptions
): Promise<LeadReport> {
  core.info("Stage 1/5: Collecting items...");
  const collected = await deps.collect(config, ctx, http);
  core.info(`  Found ${collected.length} items since ${ctx.earliest.toISOString()}`);

  core.info("Stage 2/5: Classifying and scoring...");
  const classified = classifyItems(collected, config.keywords, ctx);

  core.info("Stage 3/5: Enriching leads...");
  const profiled = classified.candidates.map((item) => profileCandidate(item));
  const enrichedClients = await deps.enrich(
    classified.clients,
    {
      enabled: config.enrichment.enabled,
      timeoutMs: config.enrichment.timeout_ms,
      concurrency: config.concurrency.enrich,
    },
    http,
    ctx
  );
  core.info(`  ${enrichedClients.enriched} client sites crawled`);

  core.info("Stage 4/5: Deduplicating and ranking...");
  const clients = dedupClients(enrichedClients.leads);
  const candidates = dedupCandidates(profiled);
  const duplicatesRemoved =
    enrichedClients.leads.length - clients.length + (profiled.length - candidates.length);

  const report: LeadReport = {
    generatedAt: ctx.now.toISOString(),
    windowStart: ctx.earliest.toISOString(),
    clients: filterClients(rankByScore(clients), config.filters),
    candidates: filterCandidates(rankByScore(candidates), config.filters),
    stats: {
      itemsCollected: collected.length,
      itemsDropped: classified.dropped,
      clientsClassified: classified.clients.length,
      candidatesClassified: classified.candidates.length,
      clientsEnriched: enrichedClients.enriched,
      duplicatesRemoved,
    },
  };
  core.info(
    `  ${report.clients.length} clients, ${report.candidates.length} candidates ranked`
  );

  core.info("Stage 5/5: Writing output...");
  await deps.output(report, dryRun);

  return report;
}
