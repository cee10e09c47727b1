import { writeFileSync } from "node:fs";
import * as core from "@actions/core";
import type { LeadReport } from "../sources/types.js";

export function serializeReport(report: LeadReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

type WriteFileFn = (path: string, data: string, encoding: BufferEncoding) => void;

export function writeReport(
  report: LeadReport,
  outputPath: string,
  dryRun: boolean,
  writeFileFn: WriteFileFn = writeFileSync
): void {
  if (dryRun) {
    core.info(
      `[dry-run] Would write ${report.clients.length} clients and ${report.candidates.length} candidates to ${outputPath}`
    );
    for (const lead of report.clients.slice(0, 10)) {
      core.info(`  client ${lead.score.toFixed(4)} ${lead.companyName ?? "(company TBD)"}: ${lead.title}`);
    }
    for (const lead of report.candidates.slice(0, 10)) {
      core.info(`  candidate ${lead.score.toFixed(4)} ${lead.author ?? "(unknown)"}: ${lead.title}`);
    }
    return;
  }

  writeFileFn(outputPath, serializeReport(report), "utf-8");
  core.info(`Wrote report to ${outputPath}`);
}
