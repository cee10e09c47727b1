import * as core from "@actions/core";
import { registrableDomain } from "../extract/signals.js";
import type { CandidateLead, ClientLead } from "../sources/types.js";

type KeyFn<T> = (item: T) => string | undefined;

/** First-seen wins. Items without a key are always kept. */
export function dedupeByKey<T>(items: T[], keyFn: KeyFn<T>): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const key = keyFn(item);
    if (!key) return true;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function clientKey(lead: ClientLead): string | undefined {
  return lead.companyDomain || registrableDomain(lead.url) || lead.url || undefined;
}

export function candidateKey(lead: CandidateLead): string | undefined {
  const author = lead.author ?? "";
  if (!author && !lead.title) return undefined;
  return JSON.stringify([author, lead.title]);
}

export function dedupClients(leads: ClientLead[]): ClientLead[] {
  const unique = dedupeByKey(leads, clientKey);
  core.info(`Dedup clients: ${leads.length} → ${unique.length}`);
  return unique;
}

export function dedupCandidates(leads: CandidateLead[]): CandidateLead[] {
  const unique = dedupeByKey(leads, candidateKey);
  core.info(`Dedup candidates: ${leads.length} → ${unique.length}`);
  return unique;
}
