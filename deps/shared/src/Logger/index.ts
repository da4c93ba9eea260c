import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { type Logger, logLevels } from "./Logger";
import { type EmojiMap, LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(t.Union(logLevels.map((l) => t.Literal(l)))),
    LOG_FILE: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv(): Logger {
  const { LOG_LEVEL, LOG_FILE } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL ?? "info", [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(new RfsTransport({ filename: LOG_FILE }));
  }
  return logger;
}
