export type LevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogSource = "library";
export type LogFormat = "pretty" | "json";

export type LogJSON = {
  time: number;               // epoch ms
  level: LevelName;
  msg: string;
  src: LogSource;
  meta?: unknown;
  stack?: string;
};

export const ALL_LEVELS: LevelName[] = [
  "trace", "debug", "info", "warn", "error", "fatal",
];

export function isLevelName(value: string): value is LevelName {
  return ALL_LEVELS.some((level) => level === value);
}
