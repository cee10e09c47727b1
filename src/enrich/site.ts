import * as core from "@actions/core";
import pLimit from "p-limit";
import {
  extractContactLinks,
  extractMetaDescription,
  extractTitle,
  htmlToText,
} from "../extract/html.js";
import {
  MAX_CONTACTS,
  emailKey,
  findEmails,
  findPhones,
  phoneKey,
  uniqueCapped,
} from "../extract/signals.js";
import type { RunContext } from "../filter/recency.js";
import { ENRICHED_WEIGHTS, scoreItem } from "../scoring/score.js";
import { describeError, fetchText, type HttpClient } from "../sources/http.js";
import type { ClientLead, Scored } from "../sources/types.js";
import { vocabulary } from "../vocabulary.js";

export interface SiteContacts {
  emails: string[];
  phones: string[];
  title?: string;
  description?: string;
}

export function contactPages(
  website: string,
  paths: string[] = vocabulary.contactPaths
): string[] {
  const base = website.replace(/\/+$/, "");
  const pages = paths.map((path) => (path ? `${base}${path}` : website));
  return [...new Set(pages)];
}

export async function scrapeSite(
  website: string,
  http: HttpClient,
  timeoutMs: number
): Promise<SiteContacts> {
  const emails: string[] = [];
  const phones: string[] = [];
  let title: string | undefined;
  let description: string | undefined;

  for (const page of contactPages(website)) {
    const result = await fetchText(http, page, timeoutMs);
    if (!result.ok) {
      core.debug(`Skipping ${page}: ${result.reason}`);
      continue;
    }

    const html = result.value;
    if (page === website) {
      title = extractTitle(html);
      description = extractMetaDescription(html);
    }

    const links = extractContactLinks(html);
    const text = htmlToText(html);
    emails.push(...links.emails, ...findEmails(text));
    phones.push(...links.phones, ...findPhones(text));

    if (
      uniqueCapped(emails, MAX_CONTACTS, emailKey).length >= MAX_CONTACTS &&
      uniqueCapped(phones, MAX_CONTACTS, phoneKey).length >= MAX_CONTACTS
    ) {
      break;
    }
  }

  return {
    emails: uniqueCapped(emails, MAX_CONTACTS, emailKey),
    phones: uniqueCapped(phones, MAX_CONTACTS, phoneKey),
    title,
    description,
  };
}

/** A client lead with only its inline contacts and the initial score. */
export function withoutSite(item: Scored<"client">): ClientLead {
  return {
    ...item,
    emails: [...item.emailsInline],
    phones: [...item.phonesInline],
  };
}

export function mergeSiteContacts(
  item: Scored<"client">,
  site: SiteContacts,
  ctx: RunContext
): ClientLead {
  const emails = uniqueCapped([...item.emailsInline, ...site.emails], MAX_CONTACTS, emailKey);
  const phones = uniqueCapped([...item.phonesInline, ...site.phones], MAX_CONTACTS, phoneKey);
  return {
    ...item,
    emails,
    phones,
    siteTitle: site.title,
    siteDescription: site.description,
    score: scoreItem({ ...item, emails, phones }, ENRICHED_WEIGHTS, ctx),
  };
}

export async function enrichClient(
  item: Scored<"client">,
  http: HttpClient,
  ctx: RunContext,
  timeoutMs: number
): Promise<ClientLead> {
  if (!item.companyWebsite) return withoutSite(item);

  const site = await scrapeSite(item.companyWebsite, http, timeoutMs);
  core.debug(
    `${item.companyWebsite}: ${site.emails.length} emails, ${site.phones.length} phones`
  );
  return mergeSiteContacts(item, site, ctx);
}

export interface EnrichmentOptions {
  enabled: boolean;
  timeoutMs: number;
  concurrency: number;
}

export interface EnrichedClients {
  leads: ClientLead[];
  enriched: number;
}

type EnrichFn = (
  item: Scored<"client">,
  http: HttpClient,
  ctx: RunContext,
  timeoutMs: number
) => Promise<ClientLead>;

export async function enrichClients(
  items: Scored<"client">[],
  options: EnrichmentOptions,
  http: HttpClient,
  ctx: RunContext,
  enrichFn: EnrichFn = enrichClient
): Promise<EnrichedClients> {
  if (!options.enabled) {
    return { leads: items.map(withoutSite), enriched: 0 };
  }

  const limit = pLimit(options.concurrency);
  const results = await Promise.allSettled(
    items.map((item) =>
      limit(() =>
        item.companyWebsite
          ? enrichFn(item, http, ctx, options.timeoutMs)
          : Promise.resolve(withoutSite(item))
      )
    )
  );

  let enriched = 0;
  const leads = results.map((result, i) => {
    if (result.status === "rejected") {
      core.warning(`Enrichment failed for "${items[i].title}": ${describeError(result.reason)}`);
      return withoutSite(items[i]);
    }
    if (items[i].companyWebsite) enriched++;
    return result.value;
  });

  return { leads, enriched };
}
