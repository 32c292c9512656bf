import { Logger } from "tslog";

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6
};

export const logger = new Logger({
  name: "department-router",
  minLevel: LEVELS[(process.env.LOG_LEVEL ?? "info").toLowerCase()] ?? LEVELS.info,
  prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  type: process.env.NODE_ENV === "test" ? "hidden" : "pretty"
});
