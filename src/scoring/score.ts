import { clamp01, recencyScore, type RunContext } from "../filter/recency.js";
import { countTriggerHits } from "../extract/signals.js";
import type { RawItem } from "../sources/types.js";
import { TRIGGER_LABELS, type TriggerLabel } from "../vocabulary.js";

export interface ScoreWeights {
  trigger: number;
  recency: number;
  engagement: number;
  accessibility: number;
}

/** Applied right after extraction. */
export const INITIAL_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({
  trigger: 0.38,
  recency: 0.3,
  engagement: 0.18,
  accessibility: 0.14,
});

/** Applied to client leads once their site contacts have been merged in. */
export const ENRICHED_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({
  trigger: 0.36,
  recency: 0.28,
  engagement: 0.16,
  accessibility: 0.2,
});

const TRIGGER_WEIGHTS: Record<TriggerLabel, number> = {
  funding: 1.0,
  launch: 0.8,
  hiring_freeze: 0.7,
  scale_up: 0.6,
  deadline: 0.5,
};
const DEFAULT_TRIGGER_WEIGHT = 0.4;

export interface SubScores {
  trigger: number;
  recency: number;
  engagement: number;
  accessibility: number;
}

export type ScoreInput = Pick<
  RawItem,
  "title" | "body" | "createdAt" | "points" | "comments"
> & {
  emails: readonly string[];
  phones: readonly string[];
};

export function triggerStrength(text: string): number {
  if (!text) return 0;
  const hits = countTriggerHits(text);
  let total = 0;
  for (const label of TRIGGER_LABELS) {
    if (hits[label] === 0) continue;
    const weight = TRIGGER_WEIGHTS[label] ?? DEFAULT_TRIGGER_WEIGHT;
    total += weight * Math.min(hits[label], 3);
  }
  return Math.min(1, total / 3);
}

export function engagementScore(points?: number, comments?: number): number {
  const value = Math.log1p(Math.max(0, (points ?? 0) + 0.6 * (comments ?? 0)));
  return Math.min(1, value / 5);
}

export function accessibilityScore(hasEmail: boolean, hasPhone: boolean): number {
  let base = hasEmail ? 0.3 : 0;
  if (hasPhone) base += 0.4;
  return Math.min(1, base);
}

export function subScores(input: ScoreInput, ctx: RunContext): SubScores {
  return {
    trigger: triggerStrength(`${input.title} ${input.body}`),
    recency: recencyScore(input.createdAt, ctx),
    engagement: engagementScore(input.points, input.comments),
    accessibility: accessibilityScore(
      input.emails.length > 0,
      input.phones.length > 0
    ),
  };
}

export function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function combineScores(parts: SubScores, weights: ScoreWeights): number {
  const total =
    weights.trigger * parts.trigger +
    weights.recency * parts.recency +
    weights.engagement * parts.engagement +
    weights.accessibility * parts.accessibility;
  return roundScore(clamp01(total));
}

export function scoreItem(
  input: ScoreInput,
  weights: ScoreWeights,
  ctx: RunContext
): number {
  return combineScores(subScores(input, ctx), weights);
}
