import * as core from "@actions/core";
import type { LeadFilters } from "../config.js";
import type { CandidateLead, ClientLead, Lead } from "../sources/types.js";

function meetsMinScore(lead: Lead, minScore: number): boolean {
  return lead.score * 100 >= minScore;
}

export function filterClients(leads: ClientLead[], filters: LeadFilters): ClientLead[] {
  const filtered = leads.filter((lead) => {
    if (!meetsMinScore(lead, filters.min_score)) return false;
    if (
      filters.industries.length > 0 &&
      (!lead.industry || !filters.industries.includes(lead.industry))
    ) {
      return false;
    }
    if (filters.require_contact && lead.emails.length === 0 && lead.phones.length === 0) {
      return false;
    }
    return true;
  });

  if (filtered.length !== leads.length) {
    core.info(`Client filters: ${leads.length} → ${filtered.length}`);
  }
  return filtered;
}

export function filterCandidates(
  leads: CandidateLead[],
  filters: LeadFilters
): CandidateLead[] {
  const filtered = leads.filter((lead) => meetsMinScore(lead, filters.min_score));
  if (filtered.length !== leads.length) {
    core.info(`Candidate filters: ${leads.length} → ${filtered.length}`);
  }
  return filtered;
}
