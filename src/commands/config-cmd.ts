// config-cmd.ts — `config get|set|list|reset`

import {
  getConfigPath,
  getDefaults,
  isValidConfigKey,
  readConfig,
  resetConfig,
  updateConfig,
  type ConfigKey,
} from "../config.js";
import { SongWhisperError } from "../errors.js";
import type { ActionResult } from "../types.js";

function configKey(key: string | undefined): ConfigKey {
  if (!key) throw new SongWhisperError("InvalidConfig", "key is required");
  if (!isValidConfigKey(key)) {
    throw new SongWhisperError("InvalidConfig", `Unknown config key: "${key}". Use config list to see valid keys.`);
  }
  return key;
}

export async function handleConfigGet(params: { key?: string }): Promise<ActionResult> {
  const key = configKey(params.key);
  const config = await readConfig();
  return { ok: true, key, data: config[key] };
}

export async function handleConfigSet(params: { key?: string; value?: string }): Promise<ActionResult> {
  const key = configKey(params.key);
  if (params.value === undefined) {
    throw new SongWhisperError("InvalidConfig", "value is required");
  }
  const stored = await updateConfig(key, params.value);
  return { ok: true, message: `${key} = ${String(stored)}`, key, value: stored };
}

export async function handleConfigList(): Promise<ActionResult> {
  const config = await readConfig();
  const defaults = getDefaults();
  const entries = Object.keys(defaults).filter(isValidConfigKey).map((key) => ({
    key,
    value: config[key],
    default: defaults[key],
    modified: config[key] !== defaults[key],
  }));
  return { ok: true, path: getConfigPath(), data: entries };
}

export async function handleConfigReset(): Promise<ActionResult> {
  const config = await resetConfig();
  return { ok: true, message: "Config reset to defaults", config };
}
