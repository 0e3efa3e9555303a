import "dotenv/config";
import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import { GatewayClient } from "./adapters/gateway/GatewayClient.js";
import { routeText } from "./core/router.js";
import { handleCommands } from "./core/commands.js";
import { ReminderStore } from "./reminders/store.js";
import { ReminderScheduler } from "./reminders/scheduler.js";
import { TimezoneSettingsStore } from "./reminders/timezones.js";
import { printError, printInbound } from "./observability/console.js";
import { targetFor } from "./types.js";

const config = loadConfig();
logger.level = config.LOG_LEVEL;

const store = new ReminderStore(config.REMINDERS_FILE);
store.load();
const timezones = new TimezoneSettingsStore(config.TIMEZONES_FILE);
timezones.load();

const gateway = new GatewayClient(config);
const scheduler = new ReminderScheduler(store, gateway.deliver, { retryMs: config.REMIND_RETRY_MS });

gateway.connect(async (evt) => {
  const decision = routeText(config.COMMAND_PREFIX, evt.text);
  if (decision.kind === "ignore") {
    logger.trace({ reason: decision.reason, nick: evt.nick, channel: evt.channel }, "route ignored");
    return;
  }
  printInbound(evt);

  try {
    const cmd = await handleCommands({
      command: decision.command,
      args: decision.args,
      sender: evt.nick,
      channel: evt.channel,
      nowMs: Date.now(),
      store,
      timezones
    });
    if (!cmd.handled) return;
    await gateway.send({ target: targetFor(evt.nick, evt.channel), text: cmd.replyText });
  } catch (err) {
    printError("handle/send", err);
    logger.error({ err, command: decision.command }, "handle/send failed");
  }
});

scheduler.start();

function shutdown(signal: string): void {
  logger.info({ signal, pending: store.size }, "Shutting down");
  scheduler.stop();
  gateway.close();
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

logger.info(
  {
    gatewayWsUrl: config.GATEWAY_WS_URL,
    remindersFile: config.REMINDERS_FILE,
    pending: store.size
  },
  "Bot started"
);
