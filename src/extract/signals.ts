import { getDomain } from "tldts";
import { parsePhoneNumberFromString } from "libphonenumber-js/max";
import type { CompanyGuess, ItemSignals, RawItem } from "../sources/types.js";
import {
  INDUSTRIES,
  TRIGGER_LABELS,
  vocabulary,
  type Industry,
  type TriggerLabel,
  type Vocabulary,
} from "../vocabulary.js";

export const MAX_CONTACTS = 5;

const URL_REGEX = /https?:\/\/[^\s)]+/g;
const EMAIL_REGEX = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const TEL_LINK_REGEX = /tel:\+?[0-9()\-\s]{7,20}/gi;
const PHONE_RUN_REGEX = /\+?[0-9][0-9()\-\s]{6,20}[0-9]/g;

export function itemText(item: Pick<RawItem, "title" | "body">): string {
  return `${item.title} ${item.body}`.toLowerCase();
}

export function extractUrls(text: string): string[] {
  return text.match(URL_REGEX) ?? [];
}

export function registrableDomain(url: string): string | undefined {
  return getDomain(url) ?? undefined;
}

/** Upper-cases every letter that follows a non-letter, lower-cases the rest. */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

export function guessCompany(
  urls: string[],
  platformDomains: string[] = vocabulary.platformDomains
): CompanyGuess | undefined {
  for (const url of urls) {
    const domain = registrableDomain(url);
    if (!domain || platformDomains.includes(domain)) continue;
    return {
      name: titleCase(domain.split(".")[0]),
      website: `https://${domain}`,
      domain,
    };
  }
  return undefined;
}

export function uniqueCapped(
  values: Iterable<string>,
  cap: number = MAX_CONTACTS,
  key: (value: string) => string = (v) => v
): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (out.length >= cap) break;
    const k = key(value);
    if (!k || seen.has(k)) continue;
    seen.add(k);
    out.push(value);
  }
  return out;
}

export const emailKey = (email: string): string => email.toLowerCase();

/** Digits and a leading plus, so differently punctuated copies of a number collide. */
export const phoneKey = (phone: string): string => phone.replace(/[^\d+]/g, "");

export function findEmails(text: string, cap: number = MAX_CONTACTS): string[] {
  if (!text) return [];
  const matches = (text.match(EMAIL_REGEX) ?? []).map((e) => e.toLowerCase());
  return uniqueCapped(matches, cap);
}

function parsePhone(
  candidate: string,
  countries: Vocabulary["phoneCountries"]
): string | undefined {
  for (const country of countries) {
    const parsed = parsePhoneNumberFromString(candidate, country);
    if (parsed && parsed.isPossible() && parsed.isValid()) {
      return parsed.formatInternational();
    }
  }
  return undefined;
}

export function findPhones(
  text: string,
  cap: number = MAX_CONTACTS,
  countries: Vocabulary["phoneCountries"] = vocabulary.phoneCountries
): string[] {
  if (!text) return [];
  const found: string[] = [];

  for (const link of text.match(TEL_LINK_REGEX) ?? []) {
    const number = link.slice(link.indexOf(":") + 1).trim();
    if (number) found.push(number);
  }

  for (const run of text.match(PHONE_RUN_REGEX) ?? []) {
    const formatted = parsePhone(run, countries);
    if (formatted) found.push(formatted);
  }

  return uniqueCapped(found, cap, phoneKey);
}

/** First industry bucket, in declared order, with any keyword hit. */
export function guessIndustry(
  text: string,
  industries: Vocabulary["industries"] = vocabulary.industries
): Industry | undefined {
  const lower = text.toLowerCase();
  return INDUSTRIES.find((industry) =>
    industries[industry].some((kw) => lower.includes(kw))
  );
}

export function countTriggerHits(
  text: string,
  triggers: Vocabulary["triggers"] = vocabulary.triggers
): Record<TriggerLabel, number> {
  const lower = text.toLowerCase();
  const count = (label: TriggerLabel) =>
    triggers[label].filter((kw) => lower.includes(kw)).length;
  return {
    funding: count("funding"),
    launch: count("launch"),
    hiring_freeze: count("hiring_freeze"),
    scale_up: count("scale_up"),
    deadline: count("deadline"),
  };
}

/** Highest-priority trigger with a hit; TRIGGER_LABELS is in priority order. */
export function detectTrigger(
  text: string,
  triggers: Vocabulary["triggers"] = vocabulary.triggers
): TriggerLabel | undefined {
  const hits = countTriggerHits(text, triggers);
  return TRIGGER_LABELS.find((label) => hits[label] > 0);
}

export function extractSignals(item: RawItem): ItemSignals {
  const text = `${item.title} ${item.body}`;
  const urls = extractUrls(`${item.title} ${item.body} ${item.url}`);
  const company = guessCompany(urls);

  return {
    urls,
    companyName: company?.name,
    companyWebsite: company?.website,
    companyDomain: company?.domain,
    trigger: detectTrigger(text),
    industry: guessIndustry(text),
    emailsInline: findEmails(item.body),
    phonesInline: findPhones(item.body),
  };
}
