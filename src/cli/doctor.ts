import "dotenv/config";
import { loadConfig } from "../config.js";
import { ReminderStore } from "../reminders/store.js";
import { TimezoneSettingsStore } from "../reminders/timezones.js";
import { formatDateTime } from "../reminders/timezone.js";
import { errorMessage } from "../utils/async.js";

type CheckResult = { ok: boolean; detail: string };

async function checkWs(wsUrl: string, token?: string): Promise<CheckResult> {
  try {
    const { default: WebSocket } = await import("ws");
    return await new Promise<CheckResult>((resolve) => {
      const headers: Record<string, string> = {};
      if (token) headers["Authorization"] = `Bearer ${token}`;
      const ws = new WebSocket(wsUrl, { headers });
      const timer = setTimeout(() => {
        ws.terminate();
        resolve({ ok: false, detail: "timeout" });
      }, 800);

      ws.on("open", () => {
        clearTimeout(timer);
        ws.close();
        resolve({ ok: true, detail: "connected" });
      });
      ws.on("error", (err: Error) => {
        clearTimeout(timer);
        resolve({ ok: false, detail: err.message });
      });
    });
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

function checkReminders(filePath: string): CheckResult {
  try {
    const store = new ReminderStore(filePath);
    const pending = store.load();
    const next = store.nextDueAtMs();
    const nextText = next === null ? "none" : `${formatDateTime(next, "UTC")} UTC`;
    return { ok: true, detail: `${pending.length} pending, next due ${nextText}` };
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

function checkTimezones(filePath: string): CheckResult {
  try {
    new TimezoneSettingsStore(filePath).load();
    return { ok: true, detail: "readable" };
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

const cfg = loadConfig();

console.log("Gateway config:");
console.log("  GATEWAY_WS_URL =", cfg.GATEWAY_WS_URL);
console.log("  REMINDERS_FILE =", cfg.REMINDERS_FILE);
console.log("  TIMEZONES_FILE =", cfg.TIMEZONES_FILE);
console.log("");

const ws = await checkWs(cfg.GATEWAY_WS_URL, cfg.GATEWAY_TOKEN);
const reminders = checkReminders(cfg.REMINDERS_FILE);
const timezones = checkTimezones(cfg.TIMEZONES_FILE);

console.log("Checks:");
console.log("  WS        :", ws.ok ? "OK" : "FAIL", "-", ws.detail);
console.log("  Reminders :", reminders.ok ? "OK" : "FAIL", "-", reminders.detail);
console.log("  Timezones :", timezones.ok ? "OK" : "FAIL", "-", timezones.detail);
console.log("");

if (!ws.ok) {
  console.log("A failed WS check usually means the chat gateway is not running or GATEWAY_WS_URL is wrong.");
  console.log("");
}

if (!reminders.ok || !timezones.ok) process.exitCode = 1;
