import { z } from "zod";
import { logger } from "../logger.js";
import { atomicWriteJson, readJsonFile } from "../utils/fs.js";
import { errorMessage } from "../utils/async.js";
import { DEFAULT_TIME_ZONE, isValidTimeZone } from "./timezone.js";
import { PersistenceError } from "./types.js";

const settingsSchema = z.object({
  users: z.record(z.string()).default({}),
  channels: z.record(z.string()).default({})
});

type TimezoneSettings = z.infer<typeof settingsSchema>;

export interface TimezoneResolver {
  /** Picks the user's zone, then the channel's, then UTC. */
  resolve(nick: string, channel: string): string;
}

function keyOf(name: string): string {
  return name.trim().toLowerCase();
}

/** Per-user and per-channel timezone settings kept in a small JSON file. */
export class TimezoneSettingsStore implements TimezoneResolver {
  private settings: TimezoneSettings = { users: {}, channels: {} };

  constructor(private readonly filePath: string) {}

  load(): void {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (err) {
      throw new PersistenceError(`Cannot read timezones from ${this.filePath}: ${errorMessage(err)}`, this.filePath, {
        cause: err
      });
    }
    const parsed = settingsSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new PersistenceError(`Timezone file ${this.filePath} is malformed`, this.filePath);
    }
    this.settings = {
      users: Object.fromEntries(Object.entries(parsed.data.users).map(([k, v]) => [keyOf(k), v])),
      channels: Object.fromEntries(Object.entries(parsed.data.channels).map(([k, v]) => [keyOf(k), v]))
    };
  }

  resolve(nick: string, channel: string): string {
    const candidates = [nick ? this.settings.users[keyOf(nick)] : undefined, channel ? this.settings.channels[keyOf(channel)] : undefined];
    for (const tz of candidates) {
      if (!tz) continue;
      if (isValidTimeZone(tz)) return tz;
      logger.warn({ nick, channel, tz }, "Ignoring unknown timezone setting");
    }
    return DEFAULT_TIME_ZONE;
  }

  userTimeZone(nick: string): string | undefined {
    return this.settings.users[keyOf(nick)];
  }

  /** Returns false when `timeZone` is not a known IANA zone. */
  setUserTimeZone(nick: string, timeZone: string): boolean {
    if (!isValidTimeZone(timeZone)) return false;
    const key = keyOf(nick);
    const previous = this.settings.users[key];
    this.settings.users[key] = timeZone;
    try {
      atomicWriteJson(this.filePath, this.settings);
    } catch (err) {
      if (previous === undefined) delete this.settings.users[key];
      else this.settings.users[key] = previous;
      throw new PersistenceError(`Cannot save timezone: ${errorMessage(err)}`, this.filePath, { cause: err });
    }
    return true;
  }
}
