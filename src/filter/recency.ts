const DAY_MS = 86_400_000;

export interface RunContext {
  readonly now: Date;
  readonly windowDays: number;
  /** Oldest timestamp an item may carry and still be collected */
  readonly earliest: Date;
}

export function createRunContext(
  now: Date = new Date(),
  windowDays = 30
): RunContext {
  return Object.freeze({
    now: new Date(now.getTime()),
    windowDays,
    earliest: new Date(now.getTime() - windowDays * DAY_MS),
  });
}

export function isWithinWindow(
  date: Date | undefined,
  ctx: RunContext
): date is Date {
  if (!date || Number.isNaN(date.getTime())) return false;
  return date.getTime() >= ctx.earliest.getTime();
}

/** NaN maps to 0. */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function recencyScore(date: Date | undefined, ctx: RunContext): number {
  if (!date || Number.isNaN(date.getTime())) return 0;
  const ageDays = (ctx.now.getTime() - date.getTime()) / DAY_MS;
  return clamp01(1 - ageDays / ctx.windowDays);
}

/** Parses an ISO/RFC date string or a unix-seconds number; undefined when unusable. */
export function parseTimestamp(value: string | number | undefined | null): Date | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const date =
    typeof value === "number" ? new Date(value * 1000) : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
