const DAY_MS = 864e5;

/** UTC calendar day (YYYY-MM-DD) of `now` shifted back by `offsetDays`. */
export function targetDay(now: Date, offsetDays: number): string {
  return new Date(now.getTime() - offsetDays * DAY_MS).toISOString().slice(0, 10);
}

/** Half-open [start, end) window of a UTC day, in epoch ms. */
export function dayBounds(day: string): { start: number; end: number } {
  const start = Date.parse(`${day}T00:00:00.000Z`);
  if (Number.isNaN(start)) throw new RangeError(`Invalid day: ${day}`);
  return { start, end: start + DAY_MS };
}
