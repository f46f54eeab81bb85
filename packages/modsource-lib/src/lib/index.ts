export * from "./types";
export * from "./errors";
export * from "./module-source";
export { UrlParseError, splitUrl, formatUrl, type RawUrl } from "./raw-url";
export {
  DEFAULT_SETTINGS,
  getConfig,
  getConfigSync,
  getSettingsFilePath,
  type Settings,
} from "./config";
export { logError } from "./utils";
export { backendLogger, type LevelName } from "./logger";
