import { SettingsError } from "../errors.js";
import { formatAjvErrors, loadAjv } from "../schema/ajv.js";
import type { StrataSettings } from "../types/settings.js";
import type { Settings } from "../types/store.js";

/** stratactl settings schema: every key required once the layers are merged. */
const SETTINGS_SCHEMA = {
  type: "object",
  required: ["schema_version", "store_path", "backup_dir", "max_backups", "history_limit", "log_level"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    store_path: { type: "string" },
    backup_dir: { type: "string" },
    max_backups: { type: "integer", minimum: 1 },
    history_limit: { type: "integer", minimum: 1 },
    log_level: { type: "string", enum: ["trace", "debug", "info", "warn", "error", "fatal", "silent"] },
  },
};

export type SettingsValidationResult =
  | { valid: true; settings: StrataSettings; errors: null }
  | { valid: false; settings: null; errors: string[] };

/** Validate loaded settings against the settings schema. */
export async function validateSettingsFile(settings: Settings): Promise<SettingsValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile(SETTINGS_SCHEMA);
  if (validate(settings) && isStrataSettings(settings)) {
    return { valid: true, settings, errors: null };
  }
  return { valid: false, settings: null, errors: formatAjvErrors(validate.errors) };
}

function isStrataSettings(value: Settings): value is Settings & StrataSettings {
  return typeof value.schema_version === "string" && typeof value.max_backups === "number";
}

/** Like validateSettingsFile, but throws SettingsError. */
export async function assertSettings(settings: Settings): Promise<StrataSettings> {
  const result = await validateSettingsFile(settings);
  if (!result.valid) {
    throw new SettingsError(`Invalid stratactl settings: ${result.errors.join("; ")}`, result.errors);
  }
  return result.settings;
}
