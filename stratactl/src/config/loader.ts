import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { mergeConfiguration, isPlainObject } from "../core/merge.js";
import { defaultBackupDir, defaultStorePath } from "../core/paths.js";
import type { Settings } from "../types/store.js";
import type { LogLevel, StrataSettings } from "../types/settings.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "STRATA_";
const ENV_KEYS = new Set(["store_path", "backup_dir", "max_backups", "history_limit", "log_level"]);
const NUMERIC_KEYS = new Set(["max_backups", "history_limit"]);

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Settings {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const doc: unknown = YAML.parse(raw);
  return isPlainObject(doc) ? doc : {};
}

/** Apply STRATA_ prefixed environment variable overrides for known keys. */
function applyEnvOverrides(settings: Settings, env: NodeJS.ProcessEnv): Settings {
  const out = { ...settings };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // STRATA_MAX_BACKUPS → max_backups
    const settingKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!ENV_KEYS.has(settingKey)) continue;
    out[settingKey] = NUMERIC_KEYS.has(settingKey) && /^-?\d+$/.test(value) ? Number(value) : value;
  }
  return out;
}

/**
 * Load layered settings: base.yaml ← <profile>.yaml ← STRATA_* environment variables.
 *
 * @param profile - Optional profile name (e.g. "ci"); loads `config/{profile}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadSettings(
  profile?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (profile) {
    merged = mergeConfiguration(merged, loadYaml(path.join(dir, `${profile}.yaml`)));
  }
  return applyEnvOverrides(merged, env);
}

export type ResolvedSettings = {
  storePath: string;
  backupDir: string;
  maxBackups: number;
  historyLimit: number;
  logLevel: LogLevel;
};

/** Fill the empty path settings with platform defaults; `storeOverride` is the CLI's --store. */
export function resolveSettings(
  settings: StrataSettings,
  env: NodeJS.ProcessEnv = process.env,
  storeOverride?: string,
): ResolvedSettings {
  const storePath = storeOverride
    ? path.resolve(storeOverride)
    : settings.store_path
      ? path.resolve(settings.store_path)
      : defaultStorePath(process.platform, env);
  return {
    storePath,
    backupDir: settings.backup_dir ? path.resolve(settings.backup_dir) : defaultBackupDir(storePath),
    maxBackups: settings.max_backups,
    historyLimit: settings.history_limit,
    logLevel: settings.log_level,
  };
}
