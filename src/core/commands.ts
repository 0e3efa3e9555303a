import { logger } from "../logger.js";
import { dueAfterDuration, parseAtArgs, splitInArgs } from "../reminders/parser.js";
import type { ReminderStore } from "../reminders/store.js";
import { formatTime } from "../reminders/timezone.js";
import type { TimezoneSettingsStore } from "../reminders/timezones.js";
import { PersistenceError, type ParseFailure, type ParseResult, type ReminderRecord } from "../reminders/types.js";
import type { CommandName } from "./router.js";

export type CommandResult = { handled: true; replyText: string } | { handled: false };

export type InRequest = {
  durationText: string;
  messageText: string;
  sender: string;
  channel: string;
  nowMs: number;
};

export type AtRequest = {
  timeText: string;
  messageText: string;
  sender: string;
  channel: string;
  nowMs: number;
  timeZone: string;
};

const REPLY_ASK = "When and what would you like me to remind?";

/** `.in`: schedules `messageText` for `sender` after the given duration. */
export function handleIn(store: ReminderStore, req: InRequest): ParseResult<ReminderRecord> {
  const due = dueAfterDuration(req.durationText, req.nowMs);
  if (!due.ok) return due;
  const reminder = store.schedule(
    { target: req.sender, channel: req.channel, dueAtMs: due.value, message: req.messageText.trim() },
    req.nowMs
  );
  return { ok: true, value: reminder };
}

/** `.at`: schedules `messageText` for `sender` at a wall-clock time in `timeZone`. */
export function handleAt(store: ReminderStore, req: AtRequest): ParseResult<ReminderRecord> {
  const line = `${req.timeText} ${req.messageText}`;
  const parsed = parseAtArgs(line, req.nowMs, req.timeZone);
  if (!parsed.ok) return parsed;
  const reminder = store.schedule(
    { target: req.sender, channel: req.channel, dueAtMs: parsed.value.dueAtMs, message: parsed.value.message },
    req.nowMs
  );
  return { ok: true, value: reminder };
}

export function formatParseFailure(failure: ParseFailure): string {
  if (!failure.token) return REPLY_ASK;
  return `Sorry, I didn't understand "${failure.token}": ${failure.reason}`;
}

function withNick(channel: string, nick: string, text: string): string {
  return channel ? `${nick}: ${text}` : text;
}

function splitFirstWord(args: string): { head: string; rest: string } {
  const m = args.trim().match(/^(\S+)\s*([\s\S]*)$/);
  if (!m) return { head: "", rest: "" };
  return { head: m[1], rest: m[2] };
}

export async function handleCommands(opts: {
  command: CommandName;
  args: string;
  sender: string;
  channel: string;
  nowMs: number;
  store: ReminderStore;
  timezones: TimezoneSettingsStore;
}): Promise<CommandResult> {
  const args = opts.args.trim();
  const reply = (text: string): CommandResult => ({ handled: true, replyText: withNick(opts.channel, opts.sender, text) });

  if (opts.command === "settz") {
    if (!args) {
      const tz = opts.timezones.resolve(opts.sender, opts.channel);
      return reply(`Your reminders use ${tz}.`);
    }
    const zone = splitFirstWord(args).head;
    try {
      if (!opts.timezones.setUserTimeZone(opts.sender, zone)) return reply(`Unknown timezone "${zone}".`);
    } catch (err) {
      logger.error({ err, sender: opts.sender }, "Saving timezone failed");
      return reply("Sorry, I could not save your timezone.");
    }
    return reply(`Timezone set to ${zone}.`);
  }

  if (!args) return reply(REPLY_ASK);

  const timeZone = opts.timezones.resolve(opts.sender, opts.channel);
  let result: ParseResult<ReminderRecord>;
  try {
    if (opts.command === "in") {
      const split = splitInArgs(args);
      result = split.ok
        ? handleIn(opts.store, { ...split.value, sender: opts.sender, channel: opts.channel, nowMs: opts.nowMs })
        : split;
    } else {
      const { head, rest } = splitFirstWord(args);
      result = handleAt(opts.store, {
        timeText: head,
        messageText: rest,
        sender: opts.sender,
        channel: opts.channel,
        nowMs: opts.nowMs,
        timeZone
      });
    }
  } catch (err) {
    if (!(err instanceof PersistenceError)) throw err;
    logger.error({ err, sender: opts.sender, command: opts.command }, "Saving reminder failed");
    return reply("Sorry, I could not save that reminder.");
  }

  if (!result.ok) return reply(formatParseFailure(result));
  logger.info({ id: result.value.id, target: result.value.target, dueAtMs: result.value.dueAtMs }, "Reminder scheduled");
  return reply(`I will remind you that at ${formatTime(result.value.dueAtMs, timeZone)}`);
}
