import type { ParseFailure, ParseFailureKind, ParseResult, ParsedReminder } from "./types.js";
import { addDays, isCalendarDate, wallClockAt, wallClockToUtcMs, type WallClock } from "./timezone.js";

const UNIT_MS: Record<string, number> = {
  d: 86_400_000,
  h: 3_600_000,
  m: 60_000,
  s: 1000
};

const UNIT_RANK: Record<string, number> = { d: 3, h: 2, m: 1, s: 0 };

const MAX_DATE_MS = 8.64e15;

const REGEX_DURATION_HEAD = /^\d+[a-z][\da-z]*$/i;
const REGEX_DURATION_WORD = /^(?:\d+[dhms])+$/i;
const REGEX_DURATION_TOKEN = /(\d+)([a-z]+)/iy;
const REGEX_TIME_LIKE = /^\d+:/;
const REGEX_DATE_LIKE = /^\d+-/;
const REGEX_TIME = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;
const REGEX_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

type Word = { text: string; start: number; end: number };

function fail(kind: ParseFailureKind, token: string, reason: string): ParseFailure {
  return { ok: false, kind, token, reason };
}

function readWord(line: string, from: number): Word | null {
  const re = /\S+/g;
  re.lastIndex = from;
  const m = re.exec(line);
  if (!m) return null;
  return { text: m[0], start: m.index, end: m.index + m[0].length };
}

/**
 * Parses `1d2h`, `2h 59m 3s` and the like into milliseconds.
 * Units are d, h, m and s, each at most once, largest first.
 */
export function parseDuration(text: string): ParseResult<number> {
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (!words.length) return fail("missing", "", "no duration given");

  const seen = new Set<string>();
  let lastRank = Infinity;
  let totalMs = 0;

  for (const word of words) {
    let pos = 0;
    while (pos < word.length) {
      REGEX_DURATION_TOKEN.lastIndex = pos;
      const m = REGEX_DURATION_TOKEN.exec(word);
      if (!m) return fail("invalid_token", word.slice(pos), "expected a number followed by d, h, m or s");
      pos = REGEX_DURATION_TOKEN.lastIndex;

      const token = m[0];
      const unit = m[2].toLowerCase();
      const unitMs = UNIT_MS[unit];
      const rank = UNIT_RANK[unit];
      if (unitMs === undefined || rank === undefined) return fail("invalid_token", token, `unknown unit "${m[2]}"`);

      const amount = Number(m[1]);
      if (!Number.isSafeInteger(amount)) return fail("invalid_token", token, "number is too large");
      if (seen.has(unit)) return fail("duplicate_unit", token, `unit "${unit}" appears twice`);
      if (rank > lastRank) return fail("unit_order", token, "units must go from days down to seconds");

      seen.add(unit);
      lastRank = rank;
      totalMs += amount * unitMs;
    }
  }

  if (!Number.isSafeInteger(totalMs)) return fail("invalid_token", text.trim(), "duration is too long");
  if (totalMs === 0) return fail("zero_duration", text.trim(), "duration must be longer than zero");
  return { ok: true, value: totalMs };
}

/**
 * Separates the leading duration words of an `.in` line from the message.
 * Words after the first join the duration only when they are made of d/h/m/s units alone.
 */
export function splitInArgs(line: string): ParseResult<{ durationText: string; messageText: string }> {
  const first = readWord(line, 0);
  if (!first) return fail("missing", "", "no duration given");
  if (!REGEX_DURATION_HEAD.test(first.text)) {
    return fail("invalid_token", first.text, "expected a duration like 1h30m");
  }

  let end = first.end;
  for (let w = readWord(line, end); w && REGEX_DURATION_WORD.test(w.text); w = readWord(line, end)) {
    end = w.end;
  }
  return {
    ok: true,
    value: { durationText: line.slice(first.start, end), messageText: line.slice(end).trim() }
  };
}

/** `nowMs` plus the parsed duration, rejected when it leaves the representable date range. */
export function dueAfterDuration(durationText: string, nowMs: number): ParseResult<number> {
  const duration = parseDuration(durationText);
  if (!duration.ok) return duration;
  const dueAtMs = nowMs + duration.value;
  if (dueAtMs > MAX_DATE_MS) return fail("invalid_token", durationText.trim(), "duration is too long");
  return { ok: true, value: dueAtMs };
}

type TimeOfDay = { hour: number; minute: number; second: number };
type CalendarDate = { year: number; month: number; day: number };

function classify(word: string): "time" | "date" | null {
  if (REGEX_TIME_LIKE.test(word)) return "time";
  if (REGEX_DATE_LIKE.test(word)) return "date";
  return null;
}

function parseTimeWord(word: string): ParseResult<TimeOfDay> {
  const m = word.match(REGEX_TIME);
  if (!m) return fail("invalid_token", word, "expected a time like 19:30 or 19:30:15");
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  const second = m[3] ? Number(m[3]) : 0;
  if (hour > 23 || minute > 59 || second > 59) return fail("invalid_token", word, "no such time of day");
  return { ok: true, value: { hour, minute, second } };
}

function parseDateWord(word: string): ParseResult<CalendarDate> {
  const m = word.match(REGEX_DATE);
  if (!m) return fail("invalid_token", word, "expected a date like 2023-06-27");
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (!isCalendarDate(year, month, day)) return fail("invalid_token", word, "no such date");
  return { ok: true, value: { year, month, day } };
}

/**
 * Parses an `.at` line: a time, a date, or both in either order, then the message.
 * A second word is read as the other half only when it is a well-formed time or date.
 *
 * A bare time that has already passed today (in `timeZone`) means tomorrow.
 * A bare date keeps the current wall-clock time of day.
 * An explicit date that lands in the past is rejected.
 */
export function parseAtArgs(line: string, nowMs: number, timeZone: string): ParseResult<ParsedReminder> {
  const first = readWord(line, 0);
  if (!first) return fail("missing", "", "no time or date given");
  const firstKind = classify(first.text);
  if (!firstKind) return fail("invalid_token", first.text, "expected a time (HH:MM[:SS]) or a date (YYYY-MM-DD)");

  let timeWord: string | undefined;
  let dateWord: string | undefined;
  if (firstKind === "time") timeWord = first.text;
  else dateWord = first.text;

  let end = first.end;
  const second = readWord(line, end);
  if (second) {
    if (firstKind === "date" && REGEX_TIME.test(second.text)) {
      timeWord = second.text;
      end = second.end;
    } else if (firstKind === "time" && REGEX_DATE.test(second.text)) {
      dateWord = second.text;
      end = second.end;
    }
  }

  let time: TimeOfDay | undefined;
  if (timeWord !== undefined) {
    const parsed = parseTimeWord(timeWord);
    if (!parsed.ok) return parsed;
    time = parsed.value;
  }
  let date: CalendarDate | undefined;
  if (dateWord !== undefined) {
    const parsed = parseDateWord(dateWord);
    if (!parsed.ok) return parsed;
    date = parsed.value;
  }

  const target: WallClock = { ...wallClockAt(nowMs, timeZone), ...date, ...time };

  let dueAtMs = wallClockToUtcMs(target, timeZone);
  if (dueAtMs <= nowMs) {
    if (date) return fail("past", line.slice(first.start, end), "that moment has already passed");
    dueAtMs = wallClockToUtcMs(addDays(target, 1), timeZone);
  }
  return { ok: true, value: { dueAtMs, message: line.slice(end).trim() } };
}
