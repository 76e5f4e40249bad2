export { ConfigurationCore, effectiveSettings, NAME_PATTERN } from "./core/configuration-core.js";
export type {
  ConfigurationCoreOptions,
  EnvironmentSummary,
  ExportOptions,
  ImportOptions,
  ImportResult,
  RegisterOptions,
  ReloadCallback,
  ReloadResult,
  SetOptions,
  ValidationReport,
} from "./core/configuration-core.js";
export { BackupManager, type BackupInfo } from "./core/backup.js";
export { EventBus, EVENT_NAMES, type StrataEvent, type StrataEventName } from "./core/events.js";
export { expandString, expandVariables, type ExpansionContext } from "./core/expand.js";
export {
  compareConfiguration,
  getPath,
  mergeAll,
  mergeConfiguration,
  setPath,
  type ConfigDifference,
} from "./core/merge.js";
export { defaultStorePath } from "./core/paths.js";
export { assertModuleSchema, schemaDefaults, toJsonSchema, validateSettings } from "./schema/module-schema.js";
export { createEmptyStore, loadStore, saveStore } from "./store/persistence.js";
export * from "./errors.js";
export type * from "./types/store.js";
export type * from "./types/schema.js";
export { DEFAULT_ENVIRONMENT, STORE_VERSION } from "./types/store.js";
export { PROPERTY_TYPES } from "./types/schema.js";
