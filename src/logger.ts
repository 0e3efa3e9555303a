import { pino } from "pino";

export const logger = pino({
  name: "remind-bot",
  level: process.env.LOG_LEVEL ?? "info"
});
