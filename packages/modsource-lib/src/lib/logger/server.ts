import { addColors, createLogger, format, transports } from "winston";

import { getConfigSync } from "../config";
import type { LevelName, LogFormat, LogJSON, LogSource } from "./types";
import { isLevelName } from "./types";

const LIBRARY_SOURCE: LogSource = "library";

const customLevels = {
  levels: {
    fatal: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5,
  },
  colors: {
    fatal: "magenta",
    error: "red",
    warn: "yellow",
    info: "green",
    debug: "blue",
    trace: "gray",
  },
};

addColors(customLevels.colors);

function toText(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function toTime(value: unknown): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? Date.now() : parsed;
  }
  return Date.now();
}

function toLevel(value: unknown): LevelName {
  return typeof value === "string" && isLevelName(value) ? value : "info";
}

const jsonLine = format.printf((info) => {
  const base: LogJSON = {
    time: toTime(info.time),
    level: toLevel(info.level),
    msg: String(info.message),
    src: LIBRARY_SOURCE,
    meta: info.meta,
    stack: toText(info.stack),
  };
  return JSON.stringify(base);
});

const consolePretty = format.printf((info) => {
  const ts = new Date(toTime(info.time)).toISOString();
  const src = toText(info.src) ?? LIBRARY_SOURCE;
  const msg = String(info.message);
  const meta = info.meta ? ` ${JSON.stringify(info.meta)}` : "";
  const stack = info.stack ? `\n${String(info.stack)}` : "";
  return `${ts} ${String(info.level)} [${src}] ${msg}${meta}${stack}`;
});

// colorize looks colors up by the original level, so it still matches here
const upperCaseLevel = format((info) => {
  info.level = info.level.toUpperCase();
  return info;
});

export function consoleFormat(logFormat: LogFormat) {
  return logFormat === "json"
    ? jsonLine
    : format.combine(upperCaseLevel(), format.colorize(), consolePretty);
}

const settings = getConfigSync();

export const serverLogger = createLogger({
  levels: customLevels.levels,
  level: settings.MODSOURCE_LOG_LEVEL,
  defaultMeta: { src: LIBRARY_SOURCE },
  format: format.combine(
    format.errors({ stack: true }),
    format.timestamp({ alias: "time", format: () => (new Date()).toISOString() }),
  ),
  transports: [
    // every level goes to stderr
    new transports.Console({
      stderrLevels: Object.keys(customLevels.levels),
      format: consoleFormat(settings.MODSOURCE_LOG_FORMAT),
    }),
  ],
});

export const backendLogger = serverLogger.child({ src: LIBRARY_SOURCE });
