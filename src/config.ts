// config.ts — Runtime configuration for songwhisper
// Config file: $SONGWHISPER_CONFIG or ~/.songwhisper/config.json
// Every stored value is checked on load; a bad value falls back to its default
// with a warning, so `config set` and `config reset` can still repair the file.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { SongWhisperError, errorMessage, isSongWhisperError } from "./errors.js";
import { createLogger, isLogLevel, type LogLevel } from "./logger.js";
import { isSiteName, type SiteName } from "./profiles.js";

const log = createLogger("config");

export const CONFIG_DIR = join(homedir(), ".songwhisper");

export function getConfigPath(): string {
  return process.env.SONGWHISPER_CONFIG || join(CONFIG_DIR, "config.json");
}

export interface RuntimeConfig {
  "site": SiteName;
  "user-data-dir": string;
  "profile-directory": string;
  "chrome-path": string;
  "language": string;
  "speech-api-key": string;
  "navigation-timeout-ms": number;
  "action-timeout-ms": number;
  "settle-scale": number;
  "log-level": LogLevel;
}

export type ConfigKey = keyof RuntimeConfig;
export type ConfigValue = RuntimeConfig[ConfigKey];

const DEFAULTS: RuntimeConfig = {
  "site": "youtube",
  "user-data-dir": join(CONFIG_DIR, "chrome-profile"),
  "profile-directory": "Default",
  "chrome-path": "",
  "language": "ko-KR",
  "speech-api-key": "",
  "navigation-timeout-ms": 30000,
  "action-timeout-ms": 5000,
  "settle-scale": 1,
  "log-level": "info",
};

export function isValidConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULTS, key);
}

export function getDefaults(): RuntimeConfig {
  return { ...DEFAULTS };
}

export interface ParsedConfig {
  config: RuntimeConfig;
  /** One message per value that was dropped in favour of its default. */
  problems: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Check the text of a config file key by key against the known keys and their types. */
export function parseConfig(text: string): ParsedConfig {
  const config = getDefaults();
  const problems: string[] = [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { config, problems: [`not valid JSON: ${errorMessage(err)}`] };
  }
  if (!isRecord(parsed)) {
    return { config, problems: ["expected a JSON object of key/value pairs"] };
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (!isValidConfigKey(key)) {
      problems.push(`unknown key "${key}" ignored`);
      continue;
    }
    try {
      Object.assign(config, { [key]: checkStoredValue(key, value) });
    } catch (err) {
      if (!isSongWhisperError(err, "InvalidConfig")) throw err;
      problems.push(`${err.message}; using ${JSON.stringify(DEFAULTS[key])}`);
    }
  }
  return { config, problems };
}

export async function readConfig(): Promise<RuntimeConfig> {
  const path = getConfigPath();
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return getDefaults();
    log.warn(`cannot read ${path}, using defaults`, { reason: errorMessage(err) });
    return getDefaults();
  }
  const { config, problems } = parseConfig(text);
  for (const problem of problems) log.warn(`${path}: ${problem}`);
  return config;
}

async function saveConfig(config: RuntimeConfig): Promise<void> {
  const path = getConfigPath();
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(config, null, 2), "utf-8");
}

/** Store one value given as command-line text; returns the value as stored. */
export async function updateConfig(key: ConfigKey, rawValue: string): Promise<ConfigValue> {
  const value = coerceValue(key, rawValue);
  const config = await readConfig();
  await saveConfig(Object.assign(config, { [key]: value }));
  return value;
}

export async function resetConfig(): Promise<RuntimeConfig> {
  const config = getDefaults();
  await saveConfig(config);
  return config;
}

/** API key from config, else from the environment. */
export function resolveSpeechApiKey(config: RuntimeConfig): string {
  return config["speech-api-key"] || process.env.GOOGLE_SPEECH_API_KEY || "";
}

function checkStoredValue(key: ConfigKey, value: unknown): ConfigValue {
  if (typeof value === "string") return coerceValue(key, value);
  if (typeof value === "number" && typeof DEFAULTS[key] === "number") return coerceValue(key, String(value));
  throw new SongWhisperError(
    "InvalidConfig",
    `Value for "${key}" must be a ${typeof DEFAULTS[key]}, got ${JSON.stringify(value)}`,
  );
}

function coerceValue(key: ConfigKey, raw: string): ConfigValue {
  switch (key) {
    case "site":
      if (!isSiteName(raw)) {
        throw new SongWhisperError("InvalidConfig", `Value for "site" must be youtube|bugs, got "${raw}"`);
      }
      return raw;
    case "log-level":
      if (!isLogLevel(raw)) {
        throw new SongWhisperError("InvalidConfig", `Value for "log-level" must be debug|info|warn|error, got "${raw}"`);
      }
      return raw;
    case "navigation-timeout-ms":
    case "action-timeout-ms":
    case "settle-scale": {
      const n = Number(raw);
      if (raw.trim() === "" || !Number.isFinite(n) || n < 0) {
        throw new SongWhisperError("InvalidConfig", `Value for "${key}" must be a non-negative number, got "${raw}"`);
      }
      return n;
    }
    default:
      return raw;
  }
}
