/** Stable sort by score, highest first. Ties keep their input order. */
export function rankByScore<T extends { score: number }>(leads: readonly T[]): T[] {
  return [...leads].sort((a, b) => b.score - a.score);
}
