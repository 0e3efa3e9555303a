import { z } from "zod";

export const reminderRecordSchema = z.object({
  id: z.string().min(1),
  dueAtMs: z.number().int(),
  createdAtMs: z.number().int(),
  target: z.string().min(1),
  channel: z.string(),
  message: z.string()
});

export type ReminderRecord = z.infer<typeof reminderRecordSchema>;

export type NewReminder = Omit<ReminderRecord, "id" | "createdAtMs">;

export type ParseFailureKind = "missing" | "invalid_token" | "duplicate_unit" | "unit_order" | "zero_duration" | "past";

export type ParseFailure = {
  ok: false;
  kind: ParseFailureKind;
  /** The offending piece of user input. */
  token: string;
  reason: string;
};

export type ParseResult<T> = { ok: true; value: T } | ParseFailure;

export type ParsedReminder = { dueAtMs: number; message: string };

export type DeliveryOutcome = { ok: true } | { ok: false; reason: string };

export type Deliver = (reminder: ReminderRecord) => Promise<DeliveryOutcome>;

export class PersistenceError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
    this.filePath = filePath;
  }
}
