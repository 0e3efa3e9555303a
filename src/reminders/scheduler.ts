import { logger } from "../logger.js";
import { errorMessage } from "../utils/async.js";
import type { ReminderStore } from "./store.js";
import type { Deliver, ReminderRecord } from "./types.js";

// setTimeout overflows past this and fires immediately
const MAX_TIMER_MS = 2_147_483_647;

export type SchedulerState = "idle" | "waiting" | "firing";

export type SchedulerOptions = {
  retryMs: number;
  now?: () => number;
};

/**
 * `unsettled` reminders were sent but could not be removed from the store.
 * They are not sent again; the loop only retries the removal.
 */
export type CycleReport = { delivered: number; failed: number; unsettled: number };

export class ReminderScheduler {
  private timer?: NodeJS.Timeout;
  private wakeAtMs: number | null = null;
  private state: SchedulerState = "idle";
  private started = false;
  private unsubscribe?: () => void;
  private readonly sentIds = new Set<string>();
  private readonly retryMs: number;
  private readonly now: () => number;

  constructor(
    private readonly store: ReminderStore,
    private readonly deliver: Deliver,
    opts: SchedulerOptions
  ) {
    this.retryMs = opts.retryMs;
    this.now = opts.now ?? Date.now;
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  /** The instant the armed timer fires at, or `null` when idle. */
  get nextWakeAtMs(): number | null {
    return this.wakeAtMs;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.unsubscribe = this.store.onScheduled((rem) => this.onScheduled(rem));
    this.arm();
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.clearTimer();
    if (this.state === "waiting") this.state = "idle";
  }

  /** Delivers everything due now. Never runs concurrently with another cycle. */
  async runCycle(): Promise<CycleReport> {
    if (this.state === "firing") return { delivered: 0, failed: 0, unsettled: 0 };
    this.clearTimer();
    this.state = "firing";

    const report: CycleReport = { delivered: 0, failed: 0, unsettled: 0 };
    try {
      for (const rem of this.store.dueReminders(this.now())) {
        report[await this.fire(rem)] += 1;
      }
    } finally {
      this.state = "idle";
    }

    if (report.delivered || report.failed || report.unsettled) logger.debug(report, "Reminder cycle finished");
    const retry = report.failed > 0 || report.unsettled > 0;
    if (this.started) this.arm(retry ? this.now() + this.retryMs : undefined);
    return report;
  }

  private async fire(rem: ReminderRecord): Promise<keyof CycleReport> {
    if (!this.sentIds.has(rem.id)) {
      try {
        const outcome = await this.deliver(rem);
        if (!outcome.ok) {
          logger.warn({ id: rem.id, target: rem.target, reason: outcome.reason }, "Reminder delivery failed, keeping it");
          return "failed";
        }
      } catch (err) {
        logger.error({ err, id: rem.id, target: rem.target }, "Reminder delivery threw, keeping it");
        return "failed";
      }
      logger.info({ id: rem.id, target: rem.target, channel: rem.channel }, "Reminder delivered");
      this.sentIds.add(rem.id);
    }

    try {
      this.store.remove(rem.id);
    } catch (err) {
      logger.error({ id: rem.id, err: errorMessage(err) }, "Delivered reminder could not be removed, retrying removal");
      return "unsettled";
    }
    this.sentIds.delete(rem.id);
    return "delivered";
  }

  private onScheduled(rem: ReminderRecord): void {
    // a cycle in progress re-arms from the store once it is done
    if (this.state === "firing") return;
    if (this.wakeAtMs === null) this.arm();
    else if (rem.dueAtMs < this.wakeAtMs) this.armAt(rem.dueAtMs);
  }

  private arm(retryAtMs?: number): void {
    const now = this.now();
    let wakeAtMs = this.store.nextDueAtMs();
    if (retryAtMs !== undefined && wakeAtMs !== null && wakeAtMs <= now) {
      // what is left due has just failed; wait for the retry unless something else comes due first
      const upcoming = this.store.nextDueAtMs(now);
      wakeAtMs = upcoming === null ? retryAtMs : Math.min(upcoming, retryAtMs);
    }
    if (wakeAtMs === null) {
      this.clearTimer();
      this.state = "idle";
      return;
    }
    this.armAt(wakeAtMs);
  }

  private armAt(wakeAtMs: number): void {
    this.clearTimer();
    const delay = Math.min(Math.max(0, wakeAtMs - this.now()), MAX_TIMER_MS);
    this.wakeAtMs = wakeAtMs;
    this.state = "waiting";
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.wakeAtMs = null;
      this.runCycle().catch((err: unknown) => {
        logger.error({ err }, "Reminder cycle crashed");
      });
    }, delay);
  }

  private clearTimer(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.wakeAtMs = null;
  }
}
