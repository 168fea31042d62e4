import { pino } from "pino";

export const logger = pino({
  name: "redub",
  level: process.env.LOG_LEVEL ?? "info",
});
