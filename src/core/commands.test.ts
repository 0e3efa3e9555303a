import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { formatParseFailure, handleCommands } from "./commands.js";
import type { CommandName } from "./router.js";
import { ReminderStore } from "../reminders/store.js";
import { TimezoneSettingsStore } from "../reminders/timezones.js";

const NOW = Date.UTC(2023, 5, 17, 10, 13, 10);

function setup(timezones?: unknown): { store: ReminderStore; tz: TimezoneSettingsStore; dir: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "remind-cmd-"));
  const tzFile = path.join(dir, "timezones.json");
  if (timezones !== undefined) fs.writeFileSync(tzFile, JSON.stringify(timezones));
  const store = new ReminderStore(path.join(dir, "reminders.json"));
  store.load();
  const tz = new TimezoneSettingsStore(tzFile);
  tz.load();
  return { store, tz, dir };
}

function run(
  ctx: { store: ReminderStore; tz: TimezoneSettingsStore },
  command: CommandName,
  args: string,
  channel = "",
  sender = "alice"
) {
  return handleCommands({ command, args, sender, channel, nowMs: NOW, store: ctx.store, timezones: ctx.tz });
}

test(".in schedules a reminder and confirms the due time", async () => {
  const ctx = setup();
  const res = await run(ctx, "in", "2h stretch your legs");
  assert.deepEqual(res, { handled: true, replyText: "I will remind you that at 12:13:10" });

  const [rem] = ctx.store.list();
  assert.equal(rem.target, "alice");
  assert.equal(rem.channel, "");
  assert.equal(rem.dueAtMs, NOW + 2 * 3_600_000);
  assert.equal(rem.message, "stretch your legs");
  assert.equal(rem.createdAtMs, NOW);
});

test("message words that merely start with digits stay in the message", async () => {
  const ctx = setup();
  assert.deepEqual(await run(ctx, "in", "1h 2nd floor meeting"), {
    handled: true,
    replyText: "I will remind you that at 11:13:10"
  });
  assert.deepEqual(await run(ctx, "at", "18:00 2-3 people dinner"), {
    handled: true,
    replyText: "I will remind you that at 18:00:00"
  });
  assert.deepEqual(
    ctx.store.list().map((r) => r.message),
    ["2nd floor meeting", "2-3 people dinner"]
  );
});

test("replies in a channel are addressed to the sender", async () => {
  const ctx = setup();
  const res = await run(ctx, "in", "1m30s tea", "#ops");
  assert.deepEqual(res, { handled: true, replyText: "alice: I will remind you that at 10:14:40" });
  assert.equal(ctx.store.list()[0].channel, "#ops");
});

test(".at uses the sender's timezone", async () => {
  const ctx = setup({ users: { alice: "Europe/Paris" } });
  const res = await run(ctx, "at", "13:00 lunch");
  assert.deepEqual(res, { handled: true, replyText: "I will remind you that at 13:00:00" });
  assert.equal(ctx.store.list()[0].dueAtMs, Date.UTC(2023, 5, 17, 11, 0, 0));
});

test("empty arguments ask for more", async () => {
  const ctx = setup();
  assert.deepEqual(await run(ctx, "in", "   "), {
    handled: true,
    replyText: "When and what would you like me to remind?"
  });
  assert.deepEqual(await run(ctx, "at", "", "#ops"), {
    handled: true,
    replyText: "alice: When and what would you like me to remind?"
  });
  assert.equal(ctx.store.size, 0);
});

test("parse failures quote the offending input", async () => {
  const ctx = setup();
  assert.deepEqual(await run(ctx, "in", "5 things"), {
    handled: true,
    replyText: 'Sorry, I didn\'t understand "5": expected a duration like 1h30m'
  });
  assert.deepEqual(await run(ctx, "at", "2023-06-16 party"), {
    handled: true,
    replyText: 'Sorry, I didn\'t understand "2023-06-16": that moment has already passed'
  });
  assert.deepEqual(await run(ctx, "in", "1h1h nap"), {
    handled: true,
    replyText: 'Sorry, I didn\'t understand "1h": unit "h" appears twice'
  });
  assert.equal(ctx.store.size, 0);
});

test("formatParseFailure asks again when nothing was given", () => {
  assert.equal(
    formatParseFailure({ ok: false, kind: "missing", token: "", reason: "no duration given" }),
    "When and what would you like me to remind?"
  );
});

test("a storage failure is reported to the sender", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "remind-cmd-"));
  const blocker = path.join(dir, "blocker");
  fs.writeFileSync(blocker, "");
  const store = new ReminderStore(path.join(blocker, "reminders.json"));
  store.load();
  const tz = new TimezoneSettingsStore(path.join(dir, "timezones.json"));
  tz.load();

  assert.deepEqual(await run({ store, tz }, "in", "1h nap", "#ops"), {
    handled: true,
    replyText: "alice: Sorry, I could not save that reminder."
  });
  assert.equal(store.size, 0);
});

test(".settz shows, validates and stores the sender's timezone", async () => {
  const ctx = setup();
  assert.deepEqual(await run(ctx, "settz", ""), { handled: true, replyText: "Your reminders use UTC." });
  assert.deepEqual(await run(ctx, "settz", "Mars/Olympus"), {
    handled: true,
    replyText: 'Unknown timezone "Mars/Olympus".'
  });
  assert.deepEqual(await run(ctx, "settz", "Asia/Tokyo"), { handled: true, replyText: "Timezone set to Asia/Tokyo." });
  assert.deepEqual(await run(ctx, "settz", ""), { handled: true, replyText: "Your reminders use Asia/Tokyo." });
  assert.deepEqual(await run(ctx, "at", "20:00 dinner"), {
    handled: true,
    replyText: "I will remind you that at 20:00:00"
  });
  assert.equal(ctx.store.list()[0].dueAtMs, Date.UTC(2023, 5, 17, 11, 0, 0));
});
