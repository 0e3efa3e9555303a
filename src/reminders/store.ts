import crypto from "node:crypto";
import { logger } from "../logger.js";
import { atomicWriteJson, readJsonFile } from "../utils/fs.js";
import { errorMessage } from "../utils/async.js";
import { PersistenceError, reminderRecordSchema, type NewReminder, type ReminderRecord } from "./types.js";

type ScheduledListener = (reminder: ReminderRecord) => void;

function compareReminders(a: ReminderRecord, b: ReminderRecord): number {
  if (a.dueAtMs !== b.dueAtMs) return a.dueAtMs - b.dueAtMs;
  if (a.createdAtMs !== b.createdAtMs) return a.createdAtMs - b.createdAtMs;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Sole owner of the pending reminders and of the file they live in.
 * Every mutation rewrites the whole file before returning.
 */
export class ReminderStore {
  private reminders: ReminderRecord[] = [];
  private readonly listeners = new Set<ScheduledListener>();

  constructor(private readonly filePath: string) {}

  get size(): number {
    return this.reminders.length;
  }

  load(): ReminderRecord[] {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (err) {
      throw new PersistenceError(`Cannot read reminders from ${this.filePath}: ${errorMessage(err)}`, this.filePath, {
        cause: err
      });
    }
    if (raw === undefined) {
      this.reminders = [];
      return [];
    }
    if (!Array.isArray(raw)) {
      throw new PersistenceError(`Reminder file ${this.filePath} does not hold a list`, this.filePath);
    }

    const loaded: ReminderRecord[] = [];
    const ids = new Set<string>();
    raw.forEach((item: unknown, index: number) => {
      const parsed = reminderRecordSchema.safeParse(item);
      if (!parsed.success) {
        logger.warn({ index, issues: parsed.error.issues.map((i) => i.message) }, "Skipping malformed reminder");
        return;
      }
      if (ids.has(parsed.data.id)) {
        logger.warn({ index, id: parsed.data.id }, "Skipping duplicate reminder id");
        return;
      }
      ids.add(parsed.data.id);
      loaded.push(parsed.data);
    });

    this.reminders = loaded;
    logger.info({ count: loaded.length, filePath: this.filePath }, "Reminders loaded");
    return this.list();
  }

  schedule(opts: NewReminder, createdAtMs = Date.now()): ReminderRecord {
    const rem: ReminderRecord = {
      id: crypto.randomUUID(),
      createdAtMs,
      dueAtMs: opts.dueAtMs,
      target: opts.target,
      channel: opts.channel,
      message: opts.message
    };
    this.reminders.push(rem);
    try {
      this.flush();
    } catch (err) {
      this.reminders = this.reminders.filter((r) => r.id !== rem.id);
      throw new PersistenceError(`Cannot save reminder: ${errorMessage(err)}`, this.filePath, { cause: err });
    }

    for (const listener of this.listeners) listener({ ...rem });
    return { ...rem };
  }

  dueReminders(nowMs: number): ReminderRecord[] {
    return this.reminders
      .filter((r) => r.dueAtMs <= nowMs)
      .sort(compareReminders)
      .map((r) => ({ ...r }));
  }

  /** Earliest due time, optionally only among reminders due strictly after `afterMs`. */
  nextDueAtMs(afterMs?: number): number | null {
    let next: number | null = null;
    for (const r of this.reminders) {
      if (afterMs !== undefined && r.dueAtMs <= afterMs) continue;
      if (next === null || r.dueAtMs < next) next = r.dueAtMs;
    }
    return next;
  }

  remove(id: string): void {
    const i = this.reminders.findIndex((r) => r.id === id);
    if (i < 0) return;
    const [removed] = this.reminders.splice(i, 1);
    try {
      this.flush();
    } catch (err) {
      this.reminders.splice(i, 0, removed);
      throw new PersistenceError(`Cannot remove reminder ${id}: ${errorMessage(err)}`, this.filePath, { cause: err });
    }
  }

  list(): ReminderRecord[] {
    return [...this.reminders].sort(compareReminders).map((r) => ({ ...r }));
  }

  onScheduled(listener: ScheduledListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private flush(): void {
    atomicWriteJson(this.filePath, this.reminders);
  }
}
