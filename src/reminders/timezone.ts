export type WallClock = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

export const DEFAULT_TIME_ZONE = "UTC";

const dtfCache = new Map<string, Intl.DateTimeFormat>();

function getWallClockDtf(timeZone: string): Intl.DateTimeFormat {
  const cached = dtfCache.get(timeZone);
  if (cached) return cached;
  const dtf = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit"
  });
  dtfCache.set(timeZone, dtf);
  return dtf;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone.trim()) return false;
  try {
    getWallClockDtf(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function wallClockAt(utcMs: number, timeZone: string): WallClock {
  const parts = getWallClockDtf(timeZone).formatToParts(new Date(utcMs));
  const lookup: Record<string, number> = {};
  for (const p of parts) {
    if (p.type === "literal") continue;
    lookup[p.type] = Number(p.value);
  }
  return {
    year: lookup.year ?? NaN,
    month: lookup.month ?? NaN,
    day: lookup.day ?? NaN,
    hour: lookup.hour ?? NaN,
    minute: lookup.minute ?? NaN,
    second: lookup.second ?? NaN
  };
}

function wallClockAsUtcMs(w: WallClock): number {
  return Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second);
}

/** Offset of `timeZone` from UTC at `utcMs`, in milliseconds (east positive). */
export function offsetMsAt(utcMs: number, timeZone: string): number {
  const wholeSecond = Math.floor(utcMs / 1000) * 1000;
  return wallClockAsUtcMs(wallClockAt(wholeSecond, timeZone)) - wholeSecond;
}

const DAY_MS = 86_400_000;

/**
 * Converts a wall-clock reading in `timeZone` to a UTC instant.
 * Inside a DST gap the result lands after the gap; inside an overlap the later (standard time) instant wins.
 */
export function wallClockToUtcMs(w: WallClock, timeZone: string): number {
  const naive = wallClockAsUtcMs(w);
  // the offsets in force a day either side cover any single transition near `naive`
  const offsets = new Set([offsetMsAt(naive - DAY_MS, timeZone), offsetMsAt(naive + DAY_MS, timeZone)]);
  const candidates = [...offsets].map((offset) => ({ utcMs: naive - offset, offset }));
  const valid = candidates.filter((c) => offsetMsAt(c.utcMs, timeZone) === c.offset);
  const pool = valid.length ? valid : candidates;
  return Math.max(...pool.map((c) => c.utcMs));
}

export function addDays(w: WallClock, days: number): WallClock {
  const moved = new Date(Date.UTC(w.year, w.month - 1, w.day + days));
  return { ...w, year: moved.getUTCFullYear(), month: moved.getUTCMonth() + 1, day: moved.getUTCDate() };
}

export function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTime(utcMs: number, timeZone: string): string {
  const w = wallClockAt(utcMs, timeZone);
  return `${pad2(w.hour)}:${pad2(w.minute)}:${pad2(w.second)}`;
}

export function formatDateTime(utcMs: number, timeZone: string): string {
  const w = wallClockAt(utcMs, timeZone);
  return `${w.year}-${pad2(w.month)}-${pad2(w.day)} ${formatTime(utcMs, timeZone)}`;
}
