import { promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { z } from "zod";

const fileSettingsSchema = z.object({
  MODSOURCE_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .optional(),
  MODSOURCE_LOG_FORMAT: z.enum(["pretty", "json"]).optional(),
  MODSOURCE_VENDOR_DIR: z.string().min(1).optional(),
});

type FileSettings = z.infer<typeof fileSettingsSchema>;

export type Settings = Required<FileSettings>;

export const DEFAULT_SETTINGS: Settings = {
  MODSOURCE_LOG_LEVEL: "info",
  MODSOURCE_LOG_FORMAT: "pretty",
  MODSOURCE_VENDOR_DIR: "/modules",
};

const SETTINGS_KEYS: (keyof Settings)[] = [
  "MODSOURCE_LOG_LEVEL",
  "MODSOURCE_LOG_FORMAT",
  "MODSOURCE_VENDOR_DIR",
];

const APP_NAME = "modsource";

export function getSettingsFilePath(
  environment: NodeJS.ProcessEnv = process.env,
): string {
  if (environment.MODSOURCE_CONFIG_PATH) {
    return path.join(
      path.resolve(environment.MODSOURCE_CONFIG_PATH),
      "settings.json",
    );
  }
  const configHome =
    environment.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(configHome, APP_NAME, "settings.json");
}

function expandPath(input: string): string {
  return input.startsWith("~")
    ? path.resolve(path.join(os.homedir(), input.slice(1)))
    : input;
}

function expandSettings(settings: FileSettings): FileSettings {
  if (settings.MODSOURCE_VENDOR_DIR === undefined) {
    return settings;
  }
  return {
    ...settings,
    MODSOURCE_VENDOR_DIR: expandPath(settings.MODSOURCE_VENDOR_DIR),
  };
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

async function loadFileSettings(
  environment: NodeJS.ProcessEnv,
): Promise<FileSettings> {
  let raw: string;
  try {
    raw = await fs.readFile(getSettingsFilePath(environment), "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    // unreadable settings behave like an empty file
    return {};
  }

  const parsed = fileSettingsSchema.safeParse(json);
  return parsed.success ? expandSettings(parsed.data) : {};
}

/**
 * Reads the settings from the environment. Values that fail validation are
 * ignored.
 */
function loadEnvSettings(environment: NodeJS.ProcessEnv): FileSettings {
  const valid: Record<string, string> = {};
  for (const key of SETTINGS_KEYS) {
    const raw = environment[key]?.trim();
    if (raw && fileSettingsSchema.safeParse({ [key]: raw }).success) {
      valid[key] = raw;
    }
  }
  return expandSettings(fileSettingsSchema.parse(valid));
}

function mergeSettings(...layers: FileSettings[]): Settings {
  const merged: Settings = { ...DEFAULT_SETTINGS };
  for (const layer of layers) {
    merged.MODSOURCE_LOG_LEVEL =
      layer.MODSOURCE_LOG_LEVEL ?? merged.MODSOURCE_LOG_LEVEL;
    merged.MODSOURCE_LOG_FORMAT =
      layer.MODSOURCE_LOG_FORMAT ?? merged.MODSOURCE_LOG_FORMAT;
    merged.MODSOURCE_VENDOR_DIR =
      layer.MODSOURCE_VENDOR_DIR ?? merged.MODSOURCE_VENDOR_DIR;
  }
  return merged;
}

/**
 * Settings from the environment over the defaults. Does not touch the
 * settings file, so it is safe to call while modules load.
 */
export function getConfigSync(
  environment: NodeJS.ProcessEnv = process.env,
): Settings {
  return mergeSettings(loadEnvSettings(environment));
}

/**
 * Settings from the environment over the settings file over the defaults.
 */
export async function getConfig(
  environment: NodeJS.ProcessEnv = process.env,
): Promise<Settings> {
  const fileSettings = await loadFileSettings(environment);
  return mergeSettings(fileSettings, loadEnvSettings(environment));
}
