import { itemText, titleCase } from "../extract/signals.js";
import type { Availability, CandidateLead, Scored } from "../sources/types.js";
import { vocabulary, type Vocabulary } from "../vocabulary.js";

const MAX_SKILLS = 15;
const MAX_PORTFOLIOS = 5;
const YEARS_REGEX = /(\d{1,2})\+?\s*(?:years|yrs|y)/;
const DEFAULT_LOCATION = "Remote/Unspecified";

type ProfileVocabulary = Pick<
  Vocabulary,
  "skills" | "immediatePhrases" | "locations" | "portfolioHosts"
>;

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function detectSkills(text: string, skills: string[] = vocabulary.skills): string[] {
  const found = new Set(skills.filter((skill) => text.includes(skill)));
  return [...found].sort().slice(0, MAX_SKILLS);
}

export function detectAvailability(
  text: string,
  phrases: string[] = vocabulary.immediatePhrases
): Availability {
  return phrases.some((p) => text.includes(p)) ? "Immediate" : "NoticePeriod";
}

export function detectYearsOfExperience(text: string): number | undefined {
  const match = text.match(YEARS_REGEX);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function detectLocation(
  text: string,
  locations: string[] = vocabulary.locations
): string {
  if (locations.length === 0) return DEFAULT_LOCATION;
  const pattern = new RegExp(`(${locations.map(escapeRegex).join("|")})`);
  const match = text.match(pattern);
  return match ? titleCase(match[1]) : DEFAULT_LOCATION;
}

export function portfolioUrls(
  urls: string[],
  hosts: string[] = vocabulary.portfolioHosts
): string[] {
  return urls.filter((u) => hosts.some((h) => u.includes(h))).slice(0, MAX_PORTFOLIOS);
}

export function profileCandidate(
  item: Scored<"candidate">,
  vocab: ProfileVocabulary = vocabulary
): CandidateLead {
  const text = itemText(item);
  return {
    ...item,
    skills: detectSkills(text, vocab.skills),
    availability: detectAvailability(text, vocab.immediatePhrases),
    yearsOfExperience: detectYearsOfExperience(text),
    location: detectLocation(text, vocab.locations),
    portfolioUrls: portfolioUrls(item.urls, vocab.portfolioHosts),
  };
}
