import type { Industry, TriggerLabel } from "../vocabulary.js";

export type SourceKind = "hackernews" | "reddit" | "feed";

export interface RawItem {
  source: SourceKind;
  sourceName: string;
  title: string;
  body: string;
  url: string;
  author?: string;
  createdAt?: Date;
  points?: number;
  comments?: number;
  /** Originating community, e.g. the subreddit name */
  channel?: string;
}

export type LeadLabel = "client" | "candidate";

export interface CompanyGuess {
  name: string;
  website: string;
  domain: string;
}

export interface ItemSignals {
  urls: string[];
  companyName?: string;
  companyWebsite?: string;
  companyDomain?: string;
  trigger?: TriggerLabel;
  industry?: Industry;
  emailsInline: string[];
  phonesInline: string[];
}

export interface ScoredItem extends RawItem, ItemSignals {
  label: LeadLabel;
  score: number;
}

export type Scored<L extends LeadLabel> = ScoredItem & { label: L };

export interface ClientLead extends ScoredItem {
  label: "client";
  emails: string[];
  phones: string[];
  siteTitle?: string;
  siteDescription?: string;
}

export type Availability = "Immediate" | "NoticePeriod";

export interface CandidateLead extends ScoredItem {
  label: "candidate";
  skills: string[];
  availability: Availability;
  yearsOfExperience?: number;
  location: string;
  portfolioUrls: string[];
}

export type Lead = ClientLead | CandidateLead;

export interface LeadReport {
  generatedAt: string;
  windowStart: string;
  clients: ClientLead[];
  candidates: CandidateLead[];
  stats: RunStats;
}

export interface RunStats {
  itemsCollected: number;
  itemsDropped: number;
  clientsClassified: number;
  candidatesClassified: number;
  clientsEnriched: number;
  duplicatesRemoved: number;
}
