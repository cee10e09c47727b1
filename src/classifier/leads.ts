import * as core from "@actions/core";
import { extractSignals } from "../extract/signals.js";
import type { RunContext } from "../filter/recency.js";
import { INITIAL_WEIGHTS, scoreItem } from "../scoring/score.js";
import type { RawItem, Scored, ScoredItem } from "../sources/types.js";
import { classifyItem, type KeywordLists } from "./heuristics.js";

export interface ClassifiedItems {
  clients: Scored<"client">[];
  candidates: Scored<"candidate">[];
  dropped: number;
}

export function hasUsableSignal(item: RawItem): boolean {
  return item.title.trim().length > 0 || item.body.trim().length > 0 || item.url.trim().length > 0;
}

export function toScoredItem(
  item: RawItem,
  label: ScoredItem["label"],
  ctx: RunContext
): ScoredItem {
  const signals = extractSignals(item);
  const score = scoreItem(
    { ...item, emails: signals.emailsInline, phones: signals.phonesInline },
    INITIAL_WEIGHTS,
    ctx
  );
  return { ...item, ...signals, label, score };
}

export function classifyItems(
  items: RawItem[],
  keywords: KeywordLists,
  ctx: RunContext
): ClassifiedItems {
  const clients: Scored<"client">[] = [];
  const candidates: Scored<"candidate">[] = [];
  let dropped = 0;

  for (const item of items) {
    if (!hasUsableSignal(item)) {
      dropped++;
      continue;
    }

    const classification = classifyItem(item, keywords);
    if (!classification) {
      dropped++;
      continue;
    }

    core.debug(`${classification.label} via ${classification.rule}: ${item.title}`);

    if (classification.label === "client") {
      clients.push({ ...toScoredItem(item, "client", ctx), label: "client" });
    } else {
      candidates.push({ ...toScoredItem(item, "candidate", ctx), label: "candidate" });
    }
  }

  core.info(
    `Classification: ${clients.length} clients, ${candidates.length} candidates, ${dropped} dropped`
  );
  return { clients, candidates, dropped };
}
