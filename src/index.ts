import * as core from "@actions/core";
import { loadConfig } from "./config.js";
import { enrichClients } from "./enrich/site.js";
import { createRunContext } from "./filter/recency.js";
import { writeReport } from "./output/report.js";
import { runPipeline } from "./pipeline.js";
import { createHttpClient } from "./sources/http.js";
import { collectAll } from "./sources/index.js";

async function run(): Promise<void> {
  try {
    const configPath = core.getInput("config_path") || ".github/lead-radar.yml";
    const outputPath = core.getInput("output_path") || "leads.json";
    const dryRun = core.getInput("dry_run") === "true";

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);

    const ctx = createRunContext(new Date(), config.recency_days);
    const http = createHttpClient({
      userAgent: config.http.user_agent,
      timeoutMs: config.http.timeout_ms,
    });

    const report = await runPipeline(
      config,
      {
        collect: collectAll,
        enrich: enrichClients,
        output: async (result, isDryRun) => writeReport(result, outputPath, isDryRun),
      },
      { ctx, http, dryRun }
    );

    core.setOutput("items_collected", report.stats.itemsCollected);
    core.setOutput("clients_found", report.clients.length);
    core.setOutput("candidates_found", report.candidates.length);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
