import { vocabulary, type Vocabulary } from "../vocabulary.js";
import type { LeadLabel } from "../sources/types.js";

export type ClassificationRule = "convention" | "hints" | "fallback" | "keywords";

export interface Classification {
  label: LeadLabel;
  rule: ClassificationRule;
}

export interface ClassifierInput {
  title: string;
  body: string;
  channel?: string;
}

export interface KeywordLists {
  client: string[];
  candidate: string[];
}

type HintVocabulary = Pick<
  Vocabulary,
  "hiringChannels" | "clientHints" | "candidateHints"
>;

function countHits(text: string, phrases: string[]): number {
  return phrases.filter((p) => text.includes(p)).length;
}

/**
 * Layered heuristics: community conventions, then hint voting, then the
 * hire/developer fallback. Returns undefined when none of them decide.
 */
export function classifyByHints(
  input: ClassifierInput,
  vocab: HintVocabulary = vocabulary
): Classification | undefined {
  const text = `${input.title} ${input.body}`.toLowerCase();

  const channel = input.channel?.toLowerCase();
  if (channel && vocab.hiringChannels.includes(channel)) {
    if (text.includes("[for hire]")) return { label: "candidate", rule: "convention" };
    if (text.includes("[hiring]")) return { label: "client", rule: "convention" };
  }

  const clientHits = countHits(text, vocab.clientHints);
  const candidateHits = countHits(text, vocab.candidateHints);
  if (candidateHits > clientHits && candidateHits > 0) {
    return { label: "candidate", rule: "hints" };
  }
  if (clientHits > 0) return { label: "client", rule: "hints" };

  if (text.includes("hire") && text.includes("developer")) {
    return { label: "client", rule: "fallback" };
  }
  if (
    (text.includes("available") || text.includes("for hire")) &&
    text.includes("developer")
  ) {
    return { label: "candidate", rule: "fallback" };
  }

  return undefined;
}

export function matchesAnyKeyword(text: string, keywords: string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((kw) => kw.length > 0 && lower.includes(kw.toLowerCase()));
}

export function classifyItem(
  input: ClassifierInput,
  keywords: KeywordLists,
  vocab: HintVocabulary = vocabulary
): Classification | undefined {
  const byHints = classifyByHints(input, vocab);
  if (byHints) return byHints;

  const text = `${input.title} ${input.body}`;
  if (matchesAnyKeyword(text, keywords.client)) {
    return { label: "client", rule: "keywords" };
  }
  if (matchesAnyKeyword(text, keywords.candidate)) {
    return { label: "candidate", rule: "keywords" };
  }
  return undefined;
}
