import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ReminderStore } from "./store.js";
import { PersistenceError } from "./types.js";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "remind-store-"));
}

test("reminders survive a restart", () => {
  const file = path.join(tempDir(), "reminders.json");
  const store = new ReminderStore(file);
  assert.deepEqual(store.load(), []);

  const rem = store.schedule({ target: "alice", channel: "#ops", dueAtMs: 5000, message: "deploy" }, 1000);
  assert.equal(rem.createdAtMs, 1000);

  const reopened = new ReminderStore(file);
  assert.deepEqual(reopened.load(), [rem]);
  assert.equal(reopened.size, 1);
});

test("remove is idempotent and persisted", () => {
  const file = path.join(tempDir(), "reminders.json");
  const store = new ReminderStore(file);
  store.load();
  const rem = store.schedule({ target: "bob", channel: "", dueAtMs: 2000, message: "tea" }, 1000);

  store.remove(rem.id);
  store.remove(rem.id);
  assert.equal(store.size, 0);

  const reopened = new ReminderStore(file);
  assert.deepEqual(reopened.load(), []);
});

test("due reminders come out by due time, then creation time", () => {
  const store = new ReminderStore(path.join(tempDir(), "reminders.json"));
  store.load();
  const late = store.schedule({ target: "a", channel: "", dueAtMs: 3000, message: "late" }, 200);
  const second = store.schedule({ target: "b", channel: "", dueAtMs: 2000, message: "second" }, 150);
  const first = store.schedule({ target: "c", channel: "", dueAtMs: 2000, message: "first" }, 100);
  store.schedule({ target: "d", channel: "", dueAtMs: 9000, message: "future" }, 100);

  assert.deepEqual(
    store.dueReminders(3000).map((r) => r.id),
    [first.id, second.id, late.id]
  );
  assert.deepEqual(store.dueReminders(1999), []);
  assert.equal(store.nextDueAtMs(), 2000);
  assert.equal(store.nextDueAtMs(3000), 9000);
  assert.equal(store.nextDueAtMs(9000), null);
});

test("reminders already overdue at load are due immediately", () => {
  const file = path.join(tempDir(), "reminders.json");
  fs.writeFileSync(
    file,
    JSON.stringify([{ id: "r1", dueAtMs: 100, createdAtMs: 50, target: "alice", channel: "#ops", message: "missed" }])
  );
  const store = new ReminderStore(file);
  store.load();
  assert.deepEqual(
    store.dueReminders(10_000).map((r) => r.message),
    ["missed"]
  );
});

test("load skips malformed entries and duplicate ids", () => {
  const file = path.join(tempDir(), "reminders.json");
  fs.writeFileSync(
    file,
    JSON.stringify([
      { id: "ok", dueAtMs: 100, createdAtMs: 50, target: "alice", channel: "", message: "keep" },
      { id: "bad", dueAtMs: "soon", createdAtMs: 50, target: "alice", channel: "", message: "drop" },
      { id: "ok", dueAtMs: 200, createdAtMs: 60, target: "bob", channel: "", message: "dupe" }
    ])
  );
  const store = new ReminderStore(file);
  assert.deepEqual(
    store.load().map((r) => r.message),
    ["keep"]
  );
});

test("load rejects a file that is not a list", () => {
  const file = path.join(tempDir(), "reminders.json");
  fs.writeFileSync(file, JSON.stringify({ reminders: [] }));
  assert.throws(() => new ReminderStore(file).load(), PersistenceError);

  fs.writeFileSync(file, "{not json");
  assert.throws(() => new ReminderStore(file).load(), PersistenceError);
});

test("a failed save leaves nothing scheduled", () => {
  const dir = tempDir();
  const blocker = path.join(dir, "blocker");
  fs.writeFileSync(blocker, "");
  const store = new ReminderStore(path.join(blocker, "reminders.json"));
  store.load();

  let notified = 0;
  store.onScheduled(() => {
    notified += 1;
  });
  assert.throws(
    () => store.schedule({ target: "alice", channel: "", dueAtMs: 1000, message: "x" }, 0),
    PersistenceError
  );
  assert.equal(store.size, 0);
  assert.equal(notified, 0);
});

test("a failed remove keeps the reminder", () => {
  const dir = tempDir();
  const sub = path.join(dir, "sub");
  const store = new ReminderStore(path.join(sub, "reminders.json"));
  store.load();
  const rem = store.schedule({ target: "alice", channel: "", dueAtMs: 1000, message: "x" }, 0);

  fs.rmSync(sub, { recursive: true });
  fs.writeFileSync(sub, "");
  assert.throws(() => store.remove(rem.id), PersistenceError);
  assert.deepEqual(store.list(), [rem]);
});

test("onScheduled listeners can unsubscribe", () => {
  const store = new ReminderStore(path.join(tempDir(), "reminders.json"));
  store.load();
  const seen: string[] = [];
  const off = store.onScheduled((r) => seen.push(r.message));
  store.schedule({ target: "a", channel: "", dueAtMs: 1, message: "one" }, 0);
  off();
  store.schedule({ target: "a", channel: "", dueAtMs: 2, message: "two" }, 0);
  assert.deepEqual(seen, ["one"]);
});
