import { readFileSync } from "node:fs";
import { isSupportedCountry, type CountryCode } from "libphonenumber-js/max";
import { z } from "zod";

export const TRIGGER_LABELS = [
  "funding",
  "launch",
  "hiring_freeze",
  "scale_up",
  "deadline",
] as const;

export type TriggerLabel = (typeof TRIGGER_LABELS)[number];

export const INDUSTRIES = [
  "Fintech",
  "Healthtech",
  "E-commerce",
  "SaaS",
  "Edtech",
  "AI/ML",
  "Logistics",
  "Real Estate",
  "Travel",
  "Social",
] as const;

export type Industry = (typeof INDUSTRIES)[number];

const phrases = z.array(z.string().min(1).transform((s) => s.toLowerCase()));

const TriggersSchema = z.object({
  funding: phrases,
  launch: phrases,
  hiring_freeze: phrases,
  scale_up: phrases,
  deadline: phrases,
});

const IndustriesSchema = z.object({
  Fintech: phrases,
  Healthtech: phrases,
  "E-commerce": phrases,
  SaaS: phrases,
  Edtech: phrases,
  "AI/ML": phrases,
  Logistics: phrases,
  "Real Estate": phrases,
  Travel: phrases,
  Social: phrases,
});

export const VocabularySchema = z.object({
  hiringChannels: phrases,
  clientHints: phrases,
  candidateHints: phrases,
  triggers: TriggersSchema,
  industries: IndustriesSchema,
  skills: phrases,
  immediatePhrases: phrases,
  locations: phrases,
  portfolioHosts: phrases,
  platformDomains: phrases,
  phoneCountries: z
    .array(z.string())
    .transform((codes) =>
      codes.filter((code): code is CountryCode => isSupportedCountry(code))
    ),
  contactPaths: z.array(z.string()),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

const VOCABULARY_URL = new URL("../data/vocabulary.json", import.meta.url);

export function loadVocabulary(url: URL = VOCABULARY_URL): Vocabulary {
  const raw: unknown = JSON.parse(readFileSync(url, "utf-8"));
  return VocabularySchema.parse(raw);
}

export const vocabulary: Vocabulary = loadVocabulary();
